import ExcelJS from "exceljs";
import JSZip from "jszip";
import { describe, expect, it } from "vitest";
import {
  UNSUPPORTED_FILE_MESSAGE,
  detectDocumentFormat,
  extractDocument,
  extractText,
} from "./extract.js";

const W_NS = 'xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"';
const P_NS =
  'xmlns:a="http://schemas.openxmlformats.org/drawingml/2006/main" xmlns:p="http://schemas.openxmlformats.org/presentationml/2006/main" xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships"';

async function buildZip(parts: Record<string, string>): Promise<Buffer> {
  const zip = new JSZip();
  for (const [partPath, content] of Object.entries(parts)) {
    zip.file(partPath, content);
  }
  return zip.generateAsync({ type: "nodebuffer" });
}

async function buildDocx(bodyXml: string): Promise<Buffer> {
  return buildZip({
    "word/document.xml": `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n<w:document ${W_NS}><w:body>${bodyXml}</w:body></w:document>`,
  });
}

function slideXml(shapesXml: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?><p:sld ${P_NS}><p:cSld><p:spTree><p:nvGrpSpPr/><p:grpSpPr/>${shapesXml}</p:spTree></p:cSld></p:sld>`;
}

function textShape(paragraphs: string[][]): string {
  const body = paragraphs
    .map((runs) => `<a:p>${runs.map((run) => `<a:r><a:rPr lang="en-US"/><a:t>${run}</a:t></a:r>`).join("")}</a:p>`)
    .join("");
  return `<p:sp><p:nvSpPr/><p:spPr/><p:txBody><a:bodyPr/>${body}</p:txBody></p:sp>`;
}

async function buildXlsx(sheets: Array<{ name: string; rows: Array<Array<string | number | null>> }>): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  for (const sheet of sheets) {
    const worksheet = workbook.addWorksheet(sheet.name);
    for (const row of sheet.rows) {
      worksheet.addRow(row);
    }
  }
  return Buffer.from(await workbook.xlsx.writeBuffer());
}

describe("detectDocumentFormat", () => {
  it("maps extensions case-insensitively", () => {
    expect(detectDocumentFormat("Brief.DOCX")).toBe("docx");
    expect(detectDocumentFormat("deck.pptx")).toBe("pptx");
    expect(detectDocumentFormat("budget.Xlsx")).toBe("xlsx");
    expect(detectDocumentFormat("schema.sql")).toBe("sql");
    expect(detectDocumentFormat("notes.txt")).toBeNull();
    expect(detectDocumentFormat("README")).toBeNull();
  });
});

describe("extractText", () => {
  it("reads top-level docx paragraphs in order", async () => {
    const data = await buildDocx(
      [
        "<w:p><w:r><w:t>Spring launch</w:t></w:r></w:p>",
        '<w:p><w:r><w:t xml:space="preserve">Save </w:t></w:r><w:hyperlink r:id="rId4"><w:r><w:t>20%</w:t></w:r></w:hyperlink><w:r><w:tab/><w:t>today &amp; tomorrow</w:t></w:r></w:p>',
        "<w:tbl><w:tr><w:tc><w:p><w:r><w:t>table cell</w:t></w:r></w:p></w:tc></w:tr></w:tbl>",
        '<w:p><w:r><w:t>line one</w:t><w:br/><w:t>line two</w:t><w:br w:type="page"/></w:r></w:p>',
        "<w:p/>",
        "<w:sectPr/>",
      ].join(""),
    );

    await expect(extractText({ name: "brief.docx", data })).resolves.toBe(
      "Spring launch\nSave 20%\ttoday & tomorrow\nline one\nline two\n",
    );
  });

  it("reads pptx shapes in presentation slide order and skips non-text shapes", async () => {
    const data = await buildZip({
      "ppt/presentation.xml": `<p:presentation ${P_NS}><p:sldIdLst><p:sldId id="257" r:id="rId3"/><p:sldId id="256" r:id="rId2"/></p:sldIdLst></p:presentation>`,
      "ppt/_rels/presentation.xml.rels":
        '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships"><Relationship Id="rId2" Type="slide" Target="slides/slide1.xml"/><Relationship Id="rId3" Type="slide" Target="slides/slide2.xml"/></Relationships>',
      "ppt/slides/slide1.xml": slideXml(`${textShape([["Thanks"]])}<p:graphicFrame><p:nvGraphicFramePr/></p:graphicFrame>`),
      "ppt/slides/slide2.xml": slideXml(
        `${textShape([["Launch day"], ["Book ", "now"]])}<p:pic><p:nvPicPr/></p:pic>`,
      ),
    });

    await expect(extractText({ name: "deck.pptx", data })).resolves.toBe("Launch day\nBook now\nThanks");
  });

  it("renders pptx soft line breaks as vertical tabs", async () => {
    const shape =
      '<p:sp><p:txBody><a:bodyPr/><a:p><a:r><a:t>Line one</a:t></a:r><a:br/><a:r><a:t>Line two</a:t></a:r></a:p></p:txBody></p:sp>';
    const data = await buildZip({
      "ppt/presentation.xml": `<p:presentation ${P_NS}><p:sldIdLst><p:sldId id="256" r:id="rId2"/></p:sldIdLst></p:presentation>`,
      "ppt/_rels/presentation.xml.rels":
        '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships"><Relationship Id="rId2" Type="slide" Target="slides/slide1.xml"/></Relationships>',
      "ppt/slides/slide1.xml": slideXml(shape),
    });

    await expect(extractText({ name: "deck.pptx", data })).resolves.toBe("Line one\vLine two");
  });

  it("joins xlsx cells with spaces and renders empty cells as empty strings", async () => {
    const data = await buildXlsx([
      {
        name: "notes",
        rows: [
          ["a", "b"],
          ["c", null],
        ],
      },
    ]);

    await expect(extractText({ name: "notes.xlsx", data })).resolves.toBe("a b\nc ");
  });

  it("concatenates xlsx sheets in workbook order", async () => {
    const data = await buildXlsx([
      {
        name: "spend",
        rows: [
          ["channel", "spend"],
          ["search", 1200],
        ],
      },
      { name: "rates", rows: [["ctr", 0.5]] },
    ]);

    await expect(extractText({ name: "budget.xlsx", data })).resolves.toBe("channel spend\nsearch 1200\nctr 0.5");
  });

  it("renders xlsx booleans, formulas and dates the way the sheet stores them", async () => {
    const workbook = new ExcelJS.Workbook();
    const worksheet = workbook.addWorksheet("launch");
    worksheet.addRow([true, false]);
    worksheet.getCell("C1").value = { formula: "1+1", result: 2, date1904: false };
    worksheet.addRow([new Date(Date.UTC(2024, 0, 2)), new Date(Date.UTC(2024, 0, 2, 13, 5, 9, 250))]);
    const data = Buffer.from(await workbook.xlsx.writeBuffer());

    await expect(extractText({ name: "launch.xlsx", data })).resolves.toBe(
      "True False =1+1\n2024-01-02 00:00:00 2024-01-02 13:05:09.250000 ",
    );
  });

  it("decodes sql files as utf-8 verbatim", async () => {
    const source = "SELECT name FROM café\r\nWHERE id = 1;\n";
    const data = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from(source, "utf8")]);

    const text = await extractText({ name: "QUERY.SQL", data });

    expect(text).toBe(`\ufeff${source}`);
    expect(Buffer.from(text, "utf8").equals(data)).toBe(true);
  });

  it("returns the unsupported message for unknown extensions", async () => {
    await expect(extractText({ name: "notes.txt", data: Buffer.from("hello") })).resolves.toBe(
      UNSUPPORTED_FILE_MESSAGE,
    );
    expect(UNSUPPORTED_FILE_MESSAGE).toBe("Unsupported file type for text extraction.");
  });

  it("converts parser failures into an error string", async () => {
    const corrupt = await extractText({ name: "broken.docx", data: Buffer.from("not a zip archive") });
    expect(corrupt.startsWith("Error extracting text: ")).toBe(true);

    const invalidUtf8 = await extractText({ name: "dump.sql", data: Buffer.from([0x53, 0xff, 0xfe]) });
    expect(invalidUtf8.startsWith("Error extracting text: ")).toBe(true);

    const missingPart = await extractText({
      name: "empty.docx",
      data: await buildZip({ "hello.txt": "hi" }),
    });
    expect(missingPart).toBe("Error extracting text: missing package part word/document.xml");
  });
});

describe("extractDocument", () => {
  it("reports structured faults", async () => {
    await expect(extractDocument({ name: "photo.gif", data: Buffer.from("x") })).resolves.toEqual({
      ok: false,
      fault: { kind: "unsupported", extension: ".gif" },
    });

    const result = await extractDocument({ name: "deck.pptx", data: await buildZip({ "a.txt": "a" }) });
    expect(result).toEqual({
      ok: false,
      fault: { kind: "parse", cause: "missing package part ppt/presentation.xml" },
    });
  });

  it("returns text for supported formats", async () => {
    await expect(extractDocument({ name: "seed.sql", data: Buffer.from("INSERT 1;") })).resolves.toEqual({
      ok: true,
      text: "INSERT 1;",
    });
  });
});
