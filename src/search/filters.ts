import type { NormalizedItem } from "./items.js";

/** Keeps items whose view count reaches {@link minViews}. `0` keeps everything. */
export function filterByViews<T extends Pick<NormalizedItem, "views">>(items: readonly T[], minViews: number): T[] {
  if (minViews <= 0) {
    return [...items];
  }
  return items.filter((item) => item.views >= minViews);
}
