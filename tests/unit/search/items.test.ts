import { expect } from "chai";

import { filterByViews, normalizeItem, normalizeItems, parseViewCount } from "../../../src/search/index.js";

describe("search/items", () => {
  it("turns a bare string into a body-only item", () => {
    expect(normalizeItem("  market report  ")).to.deep.equal({
      body: "market report",
      views: 0,
      link: "",
      channel: null,
    });
  });

  it("joins title, text and caption and skips blank parts", () => {
    const item = normalizeItem({
      title: " Weekly ",
      text: "   ",
      caption: "market report",
      views: 420,
      display_url: "https://t.me/markets/1",
      channel: { title: "Markets" },
    });
    expect(item).to.deep.equal({
      body: "Weekly\nmarket report",
      views: 420,
      link: "https://t.me/markets/1",
      channel: { title: "Markets" },
    });
  });

  it("falls back through the view and link fields", () => {
    const item = normalizeItem({
      text: "hello",
      views: "n/a",
      views_count: "1500",
      display_url: "",
      url: " https://example.test/post ",
      link: "https://ignored.test",
      channel: ["not", "an", "object"],
    });
    expect(item?.views).to.equal(1500);
    expect(item?.link).to.equal("https://example.test/post");
    expect(item?.channel).to.equal(null);
  });

  it("keeps an explicit zero view count", () => {
    expect(normalizeItem({ text: "hello", views: 0, views_count: 99 })?.views).to.equal(0);
  });

  it("treats non-object shapes as malformed", () => {
    expect(normalizeItem(null)).to.equal(null);
    expect(normalizeItem(42)).to.equal(null);
    expect(normalizeItem(["market report"])).to.equal(null);
  });

  it("parses view counters strictly", () => {
    expect(parseViewCount(12.9)).to.equal(12);
    expect(parseViewCount("+17")).to.equal(17);
    expect(parseViewCount(" 300 ")).to.equal(300);
    expect(parseViewCount("1 200")).to.equal(null);
    expect(parseViewCount("1.2K")).to.equal(null);
    expect(parseViewCount(-5)).to.equal(null);
    expect(parseViewCount(Number.NaN)).to.equal(null);
    expect(parseViewCount(true)).to.equal(null);
  });

  it("counts malformed entries of a batch", () => {
    const batch = normalizeItems(["first", 7, { text: "second" }, null]);
    expect(batch.malformed).to.equal(2);
    expect(batch.items.map((item) => item.body)).to.deep.equal(["first", "second"]);
  });

  it("filters by the view threshold", () => {
    const items = [{ views: 10 }, { views: 1000 }, { views: 999 }];
    expect(filterByViews(items, 0)).to.deep.equal(items);
    expect(filterByViews(items, 0)).to.not.equal(items);
    expect(filterByViews(items, 1000)).to.deep.equal([{ views: 1000 }]);
  });
});
