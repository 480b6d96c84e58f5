import { Frame } from "./types";

/**
 * Interface for iterating through MPEG audio frames
 * Abstracts frame traversal logic from analysis logic
 */
export interface IFrameIterator {
  /**
   * Gets the next frame from the iterator
   * @returns Promise that resolves to the next Frame, null if no more frames
   */
  next(): Promise<Frame | null>;

  /**
   * Checks if there are more frames to iterate
   * @returns true if more frames might be available
   */
  hasNext(): boolean;
}
