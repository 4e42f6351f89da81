import type { AxisKey, PictureKey } from "../types/keys.js";

/**
 * Whether adding `incoming` must replace `existing`. Custom keys carry no
 * meaning we can inspect, so they never conflict with anything.
 */
export function axisKeysConflict(existing: AxisKey, incoming: AxisKey): boolean {
  switch (incoming.type) {
    case "custom":
      return false;
    case "xmode":
    case "ymode":
      return existing.type === incoming.type;
  }
}

export function pictureKeysConflict(
  _existing: PictureKey,
  incoming: PictureKey,
): boolean {
  switch (incoming.type) {
    case "custom":
      return false;
  }
}

/**
 * Remove every key in `keys` that conflicts with `incoming`, then append it.
 * Mutates `keys` in place.
 */
export function insertKey<K>(
  keys: K[],
  incoming: K,
  conflicts: (existing: K, incoming: K) => boolean,
): void {
  for (let i = keys.length - 1; i >= 0; i--) {
    if (conflicts(keys[i], incoming)) {
      keys.splice(i, 1);
    }
  }
  keys.push(incoming);
}
