import type { AxisContent, AxisKey } from "../types/keys.js";
import { axisKeysConflict, insertKey } from "./exclusive-keys.js";

/**
 * Axis environment inside a Picture. Equivalent to the PGFPlots block
 *
 *     \begin{axis}[<keys>]
 *         <contents>
 *     \end{axis}
 */
export class Axis {
  private keyList: AxisKey[] = [];
  private contentList: AxisContent[] = [];

  get keys(): readonly AxisKey[] {
    return this.keyList;
  }

  get contents(): readonly AxisContent[] {
    return this.contentList;
  }

  /**
   * Add a key controlling the appearance of the axis. Any earlier key that
   * is mutually exclusive with it (e.g. a previous xmode) is dropped first.
   */
  addKey(key: AxisKey): void {
    insertKey(this.keyList, key, axisKeysConflict);
  }

  addContent(content: AxisContent): void {
    this.contentList.push(content);
  }
}
