import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createDocumentInfo, validateDocumentInfo } from "../src/document-info";
import {
  HtmlDocumentType,
  PdfDocumentType,
  TextDocumentType,
  WordDocumentType,
  createDocumentTypes,
  extensionOf,
  htmlToText,
  isUnsupported,
  resolveDocumentType,
  unsupported,
} from "../src/document-types";
import { DocumentRejectedError } from "../src/errors";
import { FileSystemSource, toPosix } from "../src/sources/filesystem";
import type { DocumentInfo } from "../src/types";

vi.mock("mammoth", () => ({
  extractRawText: vi.fn(async (input: { buffer: Buffer }) => ({
    value: `docx:${input.buffer.toString("utf8")}`,
    messages: [],
  })),
}));

describe("document types", () => {
  it("reads UTF-8 text and strips a leading BOM", async () => {
    const type = new TextDocumentType(["md"]);
    const stream = Readable.from([Buffer.from("\uFEFFhéllo\nworld", "utf8")]);
    expect(await type.getText(stream)).toBe("héllo\nworld");
  });

  it("matches extensions case-insensitively, with or without a dot", () => {
    const type = new TextDocumentType([".MD", "txt"]);
    expect(type.canProcess("notes/README.md")).toBe(true);
    expect(type.canProcess("a.TXT")).toBe(true);
    expect(type.canProcess("a.pdf")).toBe(false);
    expect(extensionOf("dir.v2/file")).toBe("");
  });

  it("never treats pdf or word files as plain text", () => {
    const type = new TextDocumentType(["pdf", "docx", "doc", "txt"]);
    expect(type.canProcess("a.pdf")).toBe(false);
    expect(type.canProcess("a.docx")).toBe(false);
    expect(type.canProcess("a.doc")).toBe(false);
  });

  it("extracts the raw text of a .docx through mammoth", async () => {
    const type = new WordDocumentType();
    expect(type.canProcess("reports/Q1.DOCX")).toBe(true);
    expect(type.canProcess("old.doc")).toBe(false);
    expect(await type.getText(Readable.from([Buffer.from("PK-fake")]))).toBe("docx:PK-fake");
  });

  it("reduces html to its visible text", async () => {
    const page =
      "<html><head><title>T</title><style>p{color:red}</style></head><body>" +
      "<!-- nav --><h1>Title</h1><p>Fish &amp; chips&nbsp;&lt;3</p><script>alert(1)</script>" +
      "<p>two<br>lines &#169; &#x41;</p></body></html>";
    const type = new HtmlDocumentType();
    expect(type.canProcess("site/index.htm")).toBe(true);
    expect(await type.getText(Readable.from([Buffer.from(page, "utf8")]))).toBe("Title\nFish & chips <3\ntwo\nlines © A");
  });

  it("decodes entities once and keeps unknown ones", () => {
    expect(htmlToText("a &amp;lt; b &bogus; c")).toBe("a &lt; b &bogus; c");
    expect(htmlToText("<div>  spaced \t out </div>\n\n\n\n<div>next</div>")).toBe("spaced out\n\nnext");
  });

  it("resolves the first capable type, else unsupported", () => {
    const types = createDocumentTypes(["md", "pdf"]);
    expect(types.map((t) => t.name)).toEqual(["pdf", "text"]);
    expect(resolveDocumentType("a.pdf", types)).toBeInstanceOf(PdfDocumentType);
    expect(resolveDocumentType("a.md", types).name).toBe("text");
    expect(resolveDocumentType("a.exe", types)).toBe(unsupported);
    expect(isUnsupported(resolveDocumentType("a.exe", types))).toBe(true);
  });

  it("omits the pdf type unless pdf is allowed", () => {
    expect(createDocumentTypes(["md"]).map((t) => t.name)).toEqual(["text"]);
  });

  it("puts word and html ahead of plain text when allowed", () => {
    const types = createDocumentTypes(["md", "htm", "docx", "pdf"]);
    expect(types.map((t) => t.name)).toEqual(["pdf", "word", "html", "text"]);
    expect(resolveDocumentType("a.docx", types).name).toBe("word");
    expect(resolveDocumentType("a.html", types).name).toBe("html");
  });
});

describe("validateDocumentInfo", () => {
  const valid = () =>
    createDocumentInfo({
      sourcePrefix: "fs:/docs",
      filePath: "a.md",
      stream: Readable.from([]),
      docType: new TextDocumentType(["md"]),
    });

  it("accepts a well-formed record", () => {
    const doc = valid();
    expect(doc.documentReference).toBe("fs:/docs@a.md");
    expect(() => validateDocumentInfo(doc)).not.toThrow();
  });

  it.each<[string, (d: DocumentInfo) => DocumentInfo]>([
    ["sourcePrefix", (d) => ({ ...d, sourcePrefix: "" })],
    ["filePath", (d) => ({ ...d, filePath: "" })],
    ["documentReference", (d) => ({ ...d, documentReference: "fs:/docs@b.md" })],
  ])("rejects a bad %s", (field, mutate) => {
    try {
      validateDocumentInfo(mutate(valid()));
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(DocumentRejectedError);
      expect(e instanceof DocumentRejectedError && e.field).toBe(field);
    }
  });

  it("rejects a missing record", () => {
    expect(() => validateDocumentInfo(null)).toThrow(DocumentRejectedError);
  });
});

describe("FileSystemSource", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "source-"));
    const write = async (rel: string, content: string) => {
      await fs.mkdir(path.dirname(path.join(root, rel)), { recursive: true });
      await fs.writeFile(path.join(root, rel), content, "utf8");
    };
    await write("a.md", "alpha");
    await write("sub/b.txt", "beta");
    await write("node_modules/pkg/c.md", "skip me");
    await write(".hidden.md", "skip me too");
    await write("d.json", "{}");
    await write("e.pdf", "not really a pdf");
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  async function collect(source: FileSystemSource, signal?: AbortSignal) {
    const docs: DocumentInfo[] = [];
    for await (const doc of source.documents(signal)) {
      docs.push(doc);
      doc.stream.destroy();
    }
    return docs.sort((x, y) => x.filePath.localeCompare(y.filePath));
  }

  it("yields allowed files with root-relative forward-slash paths", async () => {
    const source = new FileSystemSource({
      root,
      allowedExt: ["md", "txt", "pdf"],
      excludedFolders: ["node_modules"],
      documentTypes: [new TextDocumentType(["md", "txt"])],
    });
    const prefix = `fs:${toPosix(path.resolve(root))}`;
    expect(source.prefix).toBe(prefix);

    const docs = await collect(source);
    expect(docs.map((d) => d.filePath)).toEqual(["a.md", "e.pdf", "sub/b.txt"]);
    expect(docs.map((d) => d.documentReference)).toEqual([
      `${prefix}@a.md`,
      `${prefix}@e.pdf`,
      `${prefix}@sub/b.txt`,
    ]);
    expect(docs.map((d) => d.docType.name)).toEqual(["text", "unsupported", "text"]);
    docs.forEach((d) => expect(() => validateDocumentInfo(d)).not.toThrow());
  });

  it("streams the file content", async () => {
    const source = new FileSystemSource({
      root,
      allowedExt: ["txt"],
      documentTypes: [new TextDocumentType(["txt"])],
    });
    for await (const doc of source.documents()) {
      expect(await doc.docType.getText(doc.stream, doc.filePath)).toBe("beta");
    }
  });

  it("yields nothing once the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const source = new FileSystemSource({
      root,
      allowedExt: ["md"],
      documentTypes: [new TextDocumentType(["md"])],
    });
    expect(await collect(source, controller.signal)).toEqual([]);
  });
});
