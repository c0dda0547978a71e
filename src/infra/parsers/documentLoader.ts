import { execFile } from "node:child_process";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { promisify } from "node:util";
import { CorruptFileError, UnsupportedFormatError } from "../../domain/errors.js";
import { DocumentFormat } from "../../domain/types.js";
import { normalizeText } from "../../utils/text.js";

const execFileAsync = promisify(execFile);
const dynamicImport = (specifier: string): Promise<unknown> => import(specifier);

// pdf-parse 1.x runs a self-test when its package root is imported as ESM.
const PDF_PARSE_ENTRIES = ["pdf-parse/lib/pdf-parse.js", "pdf-parse"];

const SUPPORTED_FORMATS: readonly DocumentFormat[] = ["md", "txt", "csv", "pdf"];

interface PdfParseResult {
  text?: string;
}

type LegacyPdfParseFn = (dataBuffer: Buffer) => Promise<PdfParseResult>;
type PdfParseV2Ctor = new (input: { data: Buffer }) => {
  getText: () => Promise<PdfParseResult>;
  destroy?: () => Promise<void> | void;
};

export function getSupportedFormats(): readonly DocumentFormat[] {
  return SUPPORTED_FORMATS;
}

export function isSupportedFormat(value: string): value is DocumentFormat {
  return SUPPORTED_FORMATS.some((format) => format === value);
}

/** Format from a file name's extension. Throws UnsupportedFormatError. */
export function detectFormat(filename: string): DocumentFormat {
  const ext = path.extname(filename).toLowerCase().replace(/^\./, "");
  if (ext === "markdown") {
    return "md";
  }
  if (!isSupportedFormat(ext)) {
    throw new UnsupportedFormatError(ext, SUPPORTED_FORMATS.map((format) => `.${format}`));
  }
  return ext;
}

/**
 * Extracts ordered text blocks from raw document bytes. An empty result is a
 * CorruptFileError: there is nothing to index.
 */
export async function extractTextBlocks(bytes: Buffer, format: DocumentFormat): Promise<string[]> {
  let blocks: string[];
  if (format === "md" || format === "txt") {
    blocks = splitParagraphs(decodeUtf8(bytes));
  } else if (format === "csv") {
    blocks = csvToBlocks(decodeUtf8(bytes));
  } else {
    blocks = splitParagraphs(await loadPdfText(bytes));
  }

  if (blocks.length === 0) {
    throw new CorruptFileError(`No extractable text in ${format} document.`);
  }
  return blocks;
}

export async function loadDocumentFile(
  filePath: string,
): Promise<{ filename: string; bytes: Buffer; format: DocumentFormat }> {
  const format = detectFormat(filePath);
  const bytes = await fs.readFile(filePath);
  return { filename: path.basename(filePath), bytes, format };
}

function decodeUtf8(bytes: Buffer): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes).replace(/^\uFEFF/, "");
  } catch (error) {
    throw new CorruptFileError("Document is not valid UTF-8 text.", { cause: error });
  }
}

function splitParagraphs(text: string): string[] {
  return normalizeText(text)
    .split(/\n{2,}/)
    .map((block) => block.trim())
    .filter(Boolean);
}

/** One block per data row, rendered as `header: value` lines. */
function csvToBlocks(text: string): string[] {
  const rows = parseCsv(text).filter((row) => row.some((cell) => cell.trim()));
  if (rows.length === 0) {
    return [];
  }
  const [header, ...records] = rows;
  if (records.length === 0) {
    return [header.join(", ")];
  }
  return records.map((record) =>
    record
      .map((cell, idx) => `${header[idx]?.trim() || `column_${idx + 1}`}: ${cell.trim()}`)
      .join("\n"),
  );
}

export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = "";
  let quoted = false;

  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') {
        cell += '"';
        i += 1;
      } else if (ch === '"') {
        quoted = false;
      } else {
        cell += ch;
      }
      continue;
    }

    if (ch === '"' && cell === "") {
      quoted = true;
    } else if (ch === ",") {
      row.push(cell);
      cell = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") {
        i += 1;
      }
      row.push(cell);
      rows.push(row);
      row = [];
      cell = "";
    } else {
      cell += ch;
    }
  }

  if (quoted) {
    throw new CorruptFileError("Unterminated quoted field in CSV document.");
  }
  if (cell !== "" || row.length > 0) {
    row.push(cell);
    rows.push(row);
  }
  return rows;
}

async function loadPdfText(buffer: Buffer): Promise<string> {
  if (buffer.subarray(0, 5).toString("latin1") !== "%PDF-") {
    throw new CorruptFileError("File does not look like a PDF document.");
  }

  const viaPdfParse = await tryParsePdfWithLibrary(buffer);
  if (viaPdfParse) {
    return viaPdfParse;
  }

  const viaPdftotext = await tryParsePdfWithPdftotext(buffer);
  if (viaPdftotext) {
    return viaPdftotext;
  }

  throw new CorruptFileError("Could not extract text from PDF document.");
}

async function tryParsePdfWithLibrary(buffer: Buffer): Promise<string | null> {
  for (const entry of PDF_PARSE_ENTRIES) {
    let mod: unknown;
    try {
      mod = await dynamicImport(entry);
    } catch {
      continue;
    }
    try {
      return await parseWithModule(mod, buffer);
    } catch {
      return null;
    }
  }
  return null;
}

async function parseWithModule(mod: unknown, buffer: Buffer): Promise<string | null> {
  const legacy = resolveLegacyPdfParse(mod);
  if (legacy) {
    const parsed = await legacy(buffer);
    return normalizeText(parsed.text ?? "") || null;
  }

  const ctor = resolvePdfParseV2Ctor(mod);
  if (!ctor) {
    return null;
  }

  const parser = new ctor({ data: buffer });
  try {
    const parsed = await parser.getText();
    return normalizeText(parsed.text ?? "") || null;
  } finally {
    if (typeof parser.destroy === "function") {
      await parser.destroy();
    }
  }
}

async function tryParsePdfWithPdftotext(buffer: Buffer): Promise<string | null> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "doc-memory-pdf-"));
  const filePath = path.join(dir, "input.pdf");
  try {
    await fs.writeFile(filePath, buffer);
    const { stdout } = await execFileAsync("pdftotext", ["-layout", filePath, "-"]);
    return normalizeText(stdout) || null;
  } catch {
    return null;
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

function resolveLegacyPdfParse(mod: unknown): LegacyPdfParseFn | null {
  if (typeof mod === "function") {
    return mod as LegacyPdfParseFn;
  }
  if (!mod || typeof mod !== "object") {
    return null;
  }
  const candidate = (mod as { default?: unknown }).default;
  if (typeof candidate === "function") {
    return candidate as LegacyPdfParseFn;
  }
  return null;
}

function resolvePdfParseV2Ctor(mod: unknown): PdfParseV2Ctor | null {
  if (!mod || typeof mod !== "object") {
    return null;
  }
  const named = (mod as { PDFParse?: unknown }).PDFParse;
  if (typeof named === "function") {
    return named as PdfParseV2Ctor;
  }
  return null;
}
