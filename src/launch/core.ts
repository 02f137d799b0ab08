/**
 * Loadable emulator core detection.
 *
 * A core reference is any path whose last segment names a libretro
 * shared object (`*_libretro*.so`, `.dll` or `.dylib`), quoted or not:
 *
 *   -L "/sdcard/cores/mednafen_psx_hw_libretro_android.so"
 *   -e LIBRETRO /data/data/com.retroarch/cores/flycast_libretro_android.so
 *
 * @module launch/core
 */

/**
 * Groups: 1=core file base name. The base name cannot contain a path
 * separator, so the match always starts after the last one.
 */
const CORE_FILE_REGEX = /([^\s"'\\/=]+_libretro[A-Za-z0-9_]*\.(?:so|dll|dylib))(?=$|[\s"'])/i;

/**
 * Find the first core file referenced by a launch command.
 *
 * @returns Core file base name, or undefined when the command names none
 */
export function extractCore(command: string | undefined): string | undefined {
  if (!command) {
    return undefined;
  }
  const match = command.match(CORE_FILE_REGEX);
  return match ? match[1] : undefined;
}
