import { expect } from "chai";

import { escapeHtml, escStr, htmlStr, labelStr, suffixLine, textToDotString } from "../src/label";
import { styleKeyword } from "../src/style";

describe("textToDotString", () => {
  it("escapes backslashes, quotes and newlines in plain labels", () => {
    expect(textToDotString(labelStr('a "b" \\ c\nd'))).to.equal('"a \\"b\\" \\\\ c\\nd"');
  });

  it("renders the empty label as a pair of quotes", () => {
    expect(textToDotString(labelStr(""))).to.equal('""');
  });

  it("keeps backslashes in escStrings", () => {
    expect(textToDotString(escStr('left\\lright "q"\nx'))).to.equal('"left\\lright \\"q\\"\\nx"');
  });

  it("writes HTML-like labels verbatim between angle brackets", () => {
    expect(textToDotString(htmlStr("&sube;"))).to.equal("<&sube;>");
    expect(textToDotString(htmlStr('<b>"x"</b>'))).to.equal('<<b>"x"</b>>');
  });
});

describe("suffixLine", () => {
  it("joins two labels with a blank line", () => {
    const joined = suffixLine(labelStr('a"b'), labelStr("c"));
    expect(joined.kind).to.equal("EscStr");
    expect(textToDotString(joined)).to.equal('"a\\"b\\n\\nc"');
  });

  it("keeps plain backslashes literal and escString ones live", () => {
    const joined = suffixLine(labelStr("a\\b"), escStr("c\\ld"));
    expect(joined.text).to.equal("a\\\\b\\n\\nc\\ld");
    expect(textToDotString(joined)).to.equal('"a\\\\b\\n\\nc\\ld"');
  });

  it("renders a plain prefix the same as on its own", () => {
    const prefix = labelStr("x\\y\nz");
    const joined = suffixLine(prefix, escStr(""));
    const alone = textToDotString(prefix);

    expect(textToDotString(joined)).to.equal(`${alone.slice(0, -1)}\\n\\n"`);
  });
});

describe("escapeHtml", () => {
  it("replaces markup characters with entities", () => {
    expect(escapeHtml('a & <b> "c"')).to.equal("a &amp; &lt;b&gt; &quot;c&quot;");
  });
});

describe("styleKeyword", () => {
  it("maps none to the empty string", () => {
    expect(styleKeyword("none")).to.equal("");
  });

  it("maps every other style to its own keyword", () => {
    expect(styleKeyword("dashed")).to.equal("dashed");
    expect(styleKeyword("invis")).to.equal("invis");
    expect(styleKeyword("wedged")).to.equal("wedged");
  });
});
