/**
 * Error raised by the metadata file layer.
 *
 * Parsing and serialization never fail on content; the only failures are
 * I/O failures reading a source file or writing an output file.
 */
export class MetadataFormatError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly operation: 'read' | 'write',
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'MetadataFormatError';
  }
}
