/**
 * Sequential byte source the demuxer pulls from.
 * Abstracts the transport (file, socket, memory) from frame scanning.
 */
export interface ByteSource {
  /**
   * Reads the next bytes from the source
   * @param maxBytes - Upper bound on the returned chunk length
   * @returns Promise that resolves to up to maxBytes bytes, or null at end of input
   */
  read(maxBytes: number): Promise<Buffer | null>;
}
