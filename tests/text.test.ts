import { describe, expect, it } from "vitest";
import { collapseWhitespace, flattenText } from "../src/lib/text";

describe("collapseWhitespace", () => {
  it("collapses runs and trims", () => {
    expect(collapseWhitespace("  OS \n\t 123/2024  ")).toBe("OS 123/2024");
  });
});

describe("flattenText", () => {
  it("joins element text with single spaces", () => {
    expect(flattenText("<div><b>Case No:</b><span>OS 12/2024</span></div>")).toBe("Case No: OS 12/2024");
  });

  it("keeps noscript text", () => {
    expect(flattenText("<body><noscript><p>Case No: OS 1/2020</p></noscript><p>Listed</p></body>")).toBe(
      "Case No: OS 1/2020 Listed"
    );
  });

  it("skips script and style contents", () => {
    const html = "<html><head><style>p{}</style><script>var a = 1;</script></head><body><p>Listed</p></body></html>";
    expect(flattenText(html)).toBe("Listed");
  });

  it("decodes entities and collapses whitespace inside text nodes", () => {
    expect(flattenText("<p>Evidence &amp;\n\n   Arguments&nbsp;</p>")).toBe("Evidence & Arguments");
  });

  it("recovers text from malformed markup", () => {
    expect(flattenText("<table><tr><td>1<td>OS 5/2020</table></div></span>")).toBe("1 OS 5/2020");
  });

  it("returns an empty string for empty input", () => {
    expect(flattenText("")).toBe("");
  });
});
