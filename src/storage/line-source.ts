/**
 * Base line source - byte access to the log being viewed
 */
abstract class LineSource {
  /**
   * Display name (file path for file sources)
   */
  abstract readonly name: string | null;

  /**
   * Total size in bytes
   */
  abstract getSize(): Promise<number>;

  /**
   * Read a byte range
   * @param offset - Absolute byte offset
   * @param length - Number of bytes wanted; fewer are returned at end of data
   */
  abstract read(offset: number, length: number): Promise<Buffer>;

  /**
   * Release any handle held by the source
   */
  abstract close(): Promise<void>;
}

export { LineSource };
