import { describe, expect, it } from "vitest";
import { extractText, extractWithTagStripping } from "./extractor";

describe("extractText", () => {
  it("returns plain text and h1-h3 headings in document order", () => {
    const result = extractText("<h1>Intro</h1><p>Hello <b>world</b></p><h2>Details</h2><h3></h3>");

    expect(result.plainText).toBe("Intro Hello world Details");
    expect(result.headings).toEqual([
      { level: 1, text: "Intro", anchorId: "heading-0" },
      { level: 2, text: "Details", anchorId: "heading-1" },
      { level: 3, text: "", anchorId: "heading-2" },
    ]);
  });

  it("separates words split only by tags", () => {
    expect(extractText("<p>alpha</p><p>beta</p>").plainText).toBe("alpha beta");
  });

  it("keeps inline formatting inside words and next to punctuation", () => {
    const result = extractText("<p>I love <strong>Python</strong>. Use <em>Py</em>thon daily.</p>");
    expect(result.plainText).toBe("I love Python. Use Python daily.");
  });

  it("treats line breaks and list items as word boundaries", () => {
    expect(extractText("<p>one<br>two</p><ul><li>three</li><li>four</li></ul>").plainText).toBe("one two three four");
  });

  it("drops script and style content", () => {
    expect(extractText("<p>Keep</p><script>var x = 1;</script><style>p { color: red }</style>").plainText).toBe("Keep");
  });

  it("decodes entities", () => {
    expect(extractText("<p>Fish &amp; chips</p>").plainText).toBe("Fish & chips");
  });

  it("ignores headings below h3", () => {
    const result = extractText("<h4>Deep</h4><h5>Deeper</h5>");
    expect(result.headings).toEqual([]);
    expect(result.plainText).toBe("Deep Deeper");
  });

  it("handles unclosed tags", () => {
    expect(extractText("<p>Unclosed <b>bold text").plainText).toBe("Unclosed bold text");
    expect(extractText("<div><h2>Broken").headings).toEqual([{ level: 2, text: "Broken", anchorId: "heading-0" }]);
  });

  it("returns nothing for an empty body", () => {
    expect(extractText("")).toEqual({ plainText: "", headings: [] });
  });

  it("produces the same anchors on repeated extraction", () => {
    const body = "<h2>Same</h2><h2>Same</h2><h3>Other</h3>";
    const first = extractText(body);
    const second = extractText(body);

    expect(first.headings.map((h) => h.anchorId)).toEqual(["heading-0", "heading-1", "heading-2"]);
    expect(second).toEqual(first);
  });
});

describe("extractWithTagStripping", () => {
  it("strips tags and finds headings without a parser", () => {
    const result = extractWithTagStripping('<h2 class="x">Setup <em>guide</em></h2><p>Body text<h3>Next');

    expect(result.plainText).toBe("Setup guide Body text Next");
    expect(result.headings).toEqual([
      { level: 2, text: "Setup guide", anchorId: "heading-0" },
      { level: 3, text: "Next", anchorId: "heading-1" },
    ]);
  });

  it("counts empty headings", () => {
    expect(extractWithTagStripping("<h1></h1>").headings).toEqual([{ level: 1, text: "", anchorId: "heading-0" }]);
  });
});
