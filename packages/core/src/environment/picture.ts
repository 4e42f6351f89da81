import type { PictureKey } from "../types/keys.js";
import type { Axis } from "./axis.js";
import { insertKey, pictureKeysConflict } from "./exclusive-keys.js";

/**
 * Picture environment. Equivalent to the TikZ graphics environment
 *
 *     \begin{tikzpicture}[<keys>]
 *         <axes>
 *     \end{tikzpicture}
 */
export class Picture {
  private keyList: PictureKey[] = [];
  private axisList: Axis[] = [];

  get keys(): readonly PictureKey[] {
    return this.keyList;
  }

  get axes(): readonly Axis[] {
    return this.axisList;
  }

  /** Add a key, replacing any earlier mutually exclusive one. */
  addKey(key: PictureKey): void {
    insertKey(this.keyList, key, pictureKeysConflict);
  }

  addAxis(axis: Axis): void {
    this.axisList.push(axis);
  }
}
