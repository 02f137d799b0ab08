/**
 * Structured view of a launch command.
 *
 * Only `raw` is guaranteed; every other field is filled when the
 * corresponding pattern is recognized.
 */
export interface NormalizedLaunch {
  raw: string;
  /** Known front-end identifier, e.g. `retroarch`. */
  emulator?: string;
  /** Token that identified the front-end, as written (quotes removed). */
  binary?: string;
  /** Core file base name, e.g. `flycast_libretro_android.so`. */
  core?: string;
  /** Zero-based index of the first token carrying a rom placeholder. */
  romArgIndex?: number;
}
