import { describe, expect, it } from "vitest";
import { extractChannel, fromGeneralItem, fromPlatformItem, normalizeItems } from "./normalize";

describe("fromPlatformItem", () => {
  it("builds a short link from the video id", () => {
    const record = fromPlatformItem({
      id: { videoId: "abc123" },
      snippet: { title: "T", channelTitle: "C" },
    });

    expect(record).toEqual({
      title: "T",
      link: "https://youtu.be/abc123",
      channel: "C",
      description: null,
      views: null,
    });
  });
});

describe("extractChannel", () => {
  it("prefers the structured channel object", () => {
    expect(extractChannel({ channel: { name: "Nested" }, channel_name: "Flat" })).toBe("Nested");
  });

  it("falls back to the flat field when the object has no name", () => {
    expect(extractChannel({ channel: { name: "" }, channel_name: "Flat" })).toBe("Flat");
    expect(extractChannel({ channel: {}, channel_name: "Flat" })).toBe("Flat");
    expect(extractChannel({ channel_name: "Flat" })).toBe("Flat");
  });

  it("returns null when neither is present", () => {
    expect(extractChannel({})).toBeNull();
    expect(extractChannel({ channel: null, channel_name: "" })).toBeNull();
  });
});

describe("fromGeneralItem", () => {
  it("maps every field", () => {
    const record = fromGeneralItem({
      title: "How to fold a crane",
      link: "https://videos.example.test/watch/1",
      description: "Step by step",
      channel: { name: "Paper Lab" },
      views: "1.2M views",
    });

    expect(record).toEqual({
      title: "How to fold a crane",
      link: "https://videos.example.test/watch/1",
      description: "Step by step",
      channel: "Paper Lab",
      views: "1.2M views",
    });
  });

  it("keeps numeric view counts as text", () => {
    expect(fromGeneralItem({ title: "A", link: "L", views: 1234 }).views).toBe("1234");
  });

  it("uses empty strings for missing title and link and null for the rest", () => {
    expect(fromGeneralItem({})).toEqual({
      title: "",
      link: "",
      description: null,
      channel: null,
      views: null,
    });
  });
});

describe("normalizeItems", () => {
  it("keeps the first five in provider order", () => {
    const items = ["a", "b", "c", "d", "e", "f", "g"].map((title) => ({ title, link: `https://x.test/${title}` }));

    const records = normalizeItems(items, fromGeneralItem);

    expect(records.map((r) => r.title)).toEqual(["a", "b", "c", "d", "e"]);
  });

  it("does not pad short lists", () => {
    expect(normalizeItems([{ title: "only" }], fromGeneralItem)).toHaveLength(1);
    expect(normalizeItems([], fromGeneralItem)).toEqual([]);
  });
});
