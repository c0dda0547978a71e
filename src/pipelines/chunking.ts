import { normalizeText } from "../utils/text.js";

const DEFAULT_CHUNK_SIZE = 600;
const DEFAULT_OVERLAP = 150;
const MIN_BOUNDARY_RATIO = 0.55;

export interface ChunkingOptions {
  chunkSize?: number;
  overlap?: number;
}

export interface TextChunk {
  index: number;
  text: string;
  /** Offsets into the normalized document text. */
  start: number;
  end: number;
  section: string | null;
}

interface SectionMark {
  offset: number;
  title: string;
}

/** Joins extracted blocks into the single text that chunk offsets refer to. */
export function joinTextBlocks(blocks: readonly string[]): string {
  return normalizeText(
    blocks
      .map((block) => normalizeText(block))
      .filter(Boolean)
      .join("\n\n"),
  );
}

export function splitIntoChunks(text: string, options: ChunkingOptions = {}): TextChunk[] {
  const chunkSize = Math.max(1, Math.floor(options.chunkSize ?? DEFAULT_CHUNK_SIZE));
  const overlap = Math.min(Math.max(Math.floor(options.overlap ?? DEFAULT_OVERLAP), 0), chunkSize - 1);
  const normalized = normalizeText(text);
  if (!normalized) {
    return [];
  }

  const sections = findSections(normalized);
  const chunks: TextChunk[] = [];

  const pushPiece = (start: number, end: number) => {
    const raw = normalized.slice(start, end);
    const leading = raw.length - raw.trimStart().length;
    const trimmed = raw.trim();
    if (!trimmed) {
      return;
    }
    const pieceStart = start + leading;
    chunks.push({
      index: chunks.length,
      text: trimmed,
      start: pieceStart,
      end: pieceStart + trimmed.length,
      section: sectionAt(sections, pieceStart),
    });
  };

  let start = 0;
  while (start < normalized.length) {
    const hardEnd = Math.min(start + chunkSize, normalized.length);
    let end = hardEnd;

    if (hardEnd < normalized.length) {
      const boundary = findLastBoundary(normalized.slice(start, hardEnd));
      if (boundary >= Math.floor(chunkSize * MIN_BOUNDARY_RATIO)) {
        end = start + boundary;
      }
    }

    pushPiece(start, end);

    if (end >= normalized.length) {
      break;
    }

    const nextStart = Math.max(0, end - overlap);
    start = nextStart > start ? nextStart : end;
  }

  return chunks;
}

function findSections(text: string): SectionMark[] {
  const marks: SectionMark[] = [];
  let offset = 0;
  for (const line of text.split("\n")) {
    const trimmed = line.trim();
    if (trimmed && isSectionHeader(trimmed)) {
      marks.push({ offset, title: cleanSectionTitle(trimmed) });
    }
    offset += line.length + 1;
  }
  return marks;
}

function sectionAt(sections: SectionMark[], offset: number): string | null {
  let current: string | null = null;
  for (const mark of sections) {
    if (mark.offset > offset) {
      break;
    }
    current = mark.title;
  }
  return current;
}

function isSectionHeader(line: string): boolean {
  if (/^#{1,6}\s+/.test(line)) {
    return true;
  }
  if (/^<[^>\n]{2,80}>$/.test(line)) {
    return true;
  }
  if (/^\[[^\]\n]{2,80}\]$/.test(line)) {
    return true;
  }
  if (/^[A-Za-z0-9 _-]{2,80}:$/.test(line)) {
    return true;
  }
  // 第一章 / 第3节 style headings
  if (/^第[一二三四五六七八九十百\d]+[章节部分篇]/u.test(line) && line.length <= 40) {
    return true;
  }
  return false;
}

function cleanSectionTitle(line: string): string {
  return line
    .replace(/^#{1,6}\s+/, "")
    .replace(/^</, "")
    .replace(/>$/, "")
    .replace(/^\[/, "")
    .replace(/\]$/, "")
    .replace(/:$/, "")
    .trim();
}

/** Position just past the last natural break in `text`, or `text.length` if none. */
function findLastBoundary(text: string): number {
  const separators = ["\n\n", "\n", ". ", "! ", "? ", "; ", "。", "！", "？", "；", ", "];

  let best = -1;
  for (const separator of separators) {
    const idx = text.lastIndexOf(separator);
    if (idx >= 0) {
      best = Math.max(best, idx + separator.length);
    }
  }
  return best < 0 ? text.length : best;
}
