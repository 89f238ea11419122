import path from "node:path";
import { TextDecoder } from "node:util";
import ExcelJS, { type CellValue } from "exceljs";
import type JSZip from "jszip";
import type { UploadedFile } from "../chat-types.js";
import {
  childElements,
  findChild,
  findPath,
  openPackage,
  readPackagePart,
  textContent,
  type XmlElement,
} from "./ooxml.js";

export type DocumentFormat = "docx" | "pptx" | "xlsx" | "sql";

export type ExtractionFault =
  | {
      kind: "unsupported";
      extension: string;
    }
  | {
      kind: "parse";
      cause: string;
    };

export type ExtractionResult =
  | {
      ok: true;
      text: string;
    }
  | {
      ok: false;
      fault: ExtractionFault;
    };

export const UNSUPPORTED_FILE_MESSAGE = "Unsupported file type for text extraction.";

const FORMAT_BY_EXT: Record<string, DocumentFormat> = {
  ".docx": "docx",
  ".pptx": "pptx",
  ".xlsx": "xlsx",
  ".sql": "sql",
};

const PRESENTATION_PART = "ppt/presentation.xml";
const PRESENTATION_RELS_PART = "ppt/_rels/presentation.xml.rels";

export function detectDocumentFormat(fileName: string): DocumentFormat | null {
  return FORMAT_BY_EXT[path.extname(fileName).toLowerCase()] ?? null;
}

/**
 * Pulls plain text out of an uploaded document. Never rejects: parser failures
 * come back as a `parse` fault carrying the underlying message.
 */
export async function extractDocument(file: UploadedFile): Promise<ExtractionResult> {
  const format = detectDocumentFormat(file.name);
  if (!format) {
    return {
      ok: false,
      fault: {
        kind: "unsupported",
        extension: path.extname(file.name).toLowerCase(),
      },
    };
  }

  try {
    return {
      ok: true,
      text: await extractByFormat(format, file.data),
    };
  } catch (error) {
    return {
      ok: false,
      fault: {
        kind: "parse",
        cause: error instanceof Error ? error.message : String(error),
      },
    };
  }
}

export function renderExtractionResult(result: ExtractionResult): string {
  if (result.ok) {
    return result.text;
  }
  if (result.fault.kind === "unsupported") {
    return UNSUPPORTED_FILE_MESSAGE;
  }
  return `Error extracting text: ${result.fault.cause}`;
}

export async function extractText(file: UploadedFile): Promise<string> {
  return renderExtractionResult(await extractDocument(file));
}

async function extractByFormat(format: DocumentFormat, data: Uint8Array): Promise<string> {
  switch (format) {
    case "docx":
      return extractDocx(data);
    case "pptx":
      return extractPptx(data);
    case "xlsx":
      return extractXlsx(data);
    case "sql":
      return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(data);
  }
}

// --- docx ---

async function extractDocx(data: Uint8Array): Promise<string> {
  const zip = await openPackage(data);
  const document = await readPackagePart(zip, "word/document.xml");
  const body = findChild(document, "w:body");
  if (!body) {
    throw new Error("word/document.xml has no body");
  }
  return childElements(body, "w:p").map(readDocxParagraph).join("\n");
}

function readDocxParagraph(paragraph: XmlElement): string {
  return childElements(paragraph)
    .map((child) => {
      if (child.name === "w:r") {
        return readDocxRun(child);
      }
      if (child.name === "w:hyperlink") {
        return childElements(child, "w:r").map(readDocxRun).join("");
      }
      return "";
    })
    .join("");
}

function readDocxRun(run: XmlElement): string {
  return childElements(run)
    .map((child) => {
      switch (child.name) {
        case "w:t":
          return textContent(child);
        case "w:tab":
        case "w:ptab":
          return "\t";
        case "w:cr":
          return "\n";
        case "w:br": {
          // page and column breaks carry no text
          const breakType = child.attributes["w:type"] ?? "textWrapping";
          return breakType === "textWrapping" ? "\n" : "";
        }
        case "w:noBreakHyphen":
          return "-";
        default:
          return "";
      }
    })
    .join("");
}

// --- pptx ---

async function extractPptx(data: Uint8Array): Promise<string> {
  const zip = await openPackage(data);
  const slidePaths = await resolveSlidePaths(zip);
  const texts: string[] = [];
  for (const slidePath of slidePaths) {
    const slide = await readPackagePart(zip, slidePath);
    const shapeTree = findPath(slide, ["p:cSld", "p:spTree"]);
    if (!shapeTree) {
      continue;
    }
    for (const shape of childElements(shapeTree, "p:sp")) {
      texts.push(readShapeText(shape));
    }
  }
  return texts.join("\n");
}

async function resolveSlidePaths(zip: JSZip): Promise<string[]> {
  const presentation = await readPackagePart(zip, PRESENTATION_PART);
  const relationships = await readPackagePart(zip, PRESENTATION_RELS_PART);

  const targetsById = new Map<string, string>();
  for (const relationship of childElements(relationships, "Relationship")) {
    const id = relationship.attributes.Id;
    const target = relationship.attributes.Target;
    if (id && target) {
      targetsById.set(id, resolvePartTarget("ppt", target));
    }
  }

  const slideIdList = findChild(presentation, "p:sldIdLst");
  if (!slideIdList) {
    return [];
  }

  const slidePaths: string[] = [];
  for (const slideId of childElements(slideIdList, "p:sldId")) {
    const relationshipId = slideId.attributes["r:id"] ?? "";
    const target = targetsById.get(relationshipId);
    if (!target) {
      throw new Error(`slide relationship ${relationshipId || "(none)"} not found`);
    }
    slidePaths.push(target);
  }
  return slidePaths;
}

function resolvePartTarget(baseDir: string, target: string): string {
  if (target.startsWith("/")) {
    return path.posix.normalize(target.slice(1));
  }
  return path.posix.normalize(path.posix.join(baseDir, target));
}

function readShapeText(shape: XmlElement): string {
  const textBody = findChild(shape, "p:txBody");
  if (!textBody) {
    return "";
  }
  return childElements(textBody, "a:p")
    .map((paragraph) =>
      childElements(paragraph)
        .map((child) => {
          if (child.name === "a:r" || child.name === "a:fld") {
            const textNode = findChild(child, "a:t");
            return textNode ? textContent(textNode) : "";
          }
          // soft line break inside a paragraph
          if (child.name === "a:br") {
            return "\v";
          }
          return "";
        })
        .join(""),
    )
    .join("\n");
}

// --- xlsx ---

async function extractXlsx(data: Uint8Array): Promise<string> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(toArrayBuffer(data));

  const lines: string[] = [];
  for (const worksheet of workbook.worksheets) {
    const columnCount = worksheet.columnCount;
    for (let rowNumber = 1; rowNumber <= worksheet.rowCount; rowNumber += 1) {
      const row = worksheet.getRow(rowNumber);
      const cells: string[] = [];
      for (let column = 1; column <= columnCount; column += 1) {
        cells.push(formatCell(row.getCell(column)));
      }
      lines.push(cells.join(" "));
    }
  }
  return lines.join("\n");
}

// Formula cells show their formula, not the cached result.
function formatCell(cell: ExcelJS.Cell): string {
  const value = cell.value;
  if (typeof value === "object" && value !== null && !(value instanceof Date)) {
    if ("formula" in value || "sharedFormula" in value) {
      return `=${cell.formula}`;
    }
  }
  return formatCellValue(value);
}

function formatCellValue(value: CellValue): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "boolean") {
    return value ? "True" : "False";
  }
  if (typeof value === "string" || typeof value === "number") {
    return String(value);
  }
  if (value instanceof Date) {
    return formatCellDate(value);
  }
  if ("richText" in value) {
    return value.richText.map((part) => part.text).join("");
  }
  if ("hyperlink" in value) {
    return value.text;
  }
  if ("error" in value) {
    return value.error;
  }
  return "";
}

/** `YYYY-MM-DD HH:MM:SS`, with microseconds only when the time has a fraction. */
function formatCellDate(date: Date): string {
  const pad = (value: number, width = 2) => String(value).padStart(width, "0");
  const stamp =
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  const millis = date.getUTCMilliseconds();
  return millis ? `${stamp}.${pad(millis * 1000, 6)}` : stamp;
}

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}
