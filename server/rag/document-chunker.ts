import type { ChunkMetadata, DocumentChunk, StartupRecord } from "../domain/types.js";

const PARAGRAPH_SEPARATOR = "\n\n";
const SENTENCE_SEPARATOR = " ";

export interface DocumentChunkerOptions {
  chunkSize?: number;
  chunkOverlap?: number;
}

// A packing unit and the separator that follows it when joined to the next one.
interface Unit {
  text: string;
  sep: string;
}

function render(units: Unit[]): string {
  return units.map((unit, index) => (index < units.length - 1 ? unit.text + unit.sep : unit.text)).join("");
}

function orNotSpecified(value: string): string {
  return value.trim() || "Not specified";
}

export function serializeStartup(record: StartupRecord): string {
  return [
    `Name: ${orNotSpecified(record.name)}`,
    `Description: ${orNotSpecified(record.description)}`,
    `Tags: ${record.tags.length > 0 ? record.tags.join(", ") : "Not specified"}`,
    `URL: ${orNotSpecified(record.url)}`,
    `Contact: ${orNotSpecified(record.contact)}`,
    `Domain: ${orNotSpecified(record.domain)}`,
    `Location: ${orNotSpecified(record.location)}`
  ].join(PARAGRAPH_SEPARATOR);
}

export function chunkMetadata(record: StartupRecord): ChunkMetadata {
  return {
    source: "startup_crawl",
    startupId: record.id,
    startupName: record.name,
    tags: [...record.tags],
    domain: record.domain,
    location: record.location
  };
}

export class DocumentChunker {
  readonly chunkSize: number;
  readonly chunkOverlap: number;

  constructor(options: DocumentChunkerOptions = {}) {
    this.chunkSize = Math.max(1, options.chunkSize ?? 1000);
    this.chunkOverlap = Math.min(Math.max(0, options.chunkOverlap ?? 200), this.chunkSize - 1);
  }

  chunkStartup(record: StartupRecord): DocumentChunk[] {
    const metadata = chunkMetadata(record);
    return this.chunkText(serializeStartup(record)).map((content) => ({ content, metadata }));
  }

  chunkStartups(records: StartupRecord[]): DocumentChunk[] {
    return records.flatMap((record) => this.chunkStartup(record));
  }

  /**
   * Greedy packing: paragraphs first, sentences for oversized paragraphs. A sentence longer
   * than `chunkSize` is emitted on its own. Trailing units of a full chunk that fit in
   * `chunkOverlap` are repeated at the start of the next one when the result still fits.
   */
  chunkText(text: string): string[] {
    const chunks: string[] = [];
    let current: Unit[] = [];

    const flush = () => {
      const content = render(current).trim();
      if (content) chunks.push(content);
    };

    for (const unit of this.units(text)) {
      if (unit.text.length > this.chunkSize) {
        flush();
        chunks.push(unit.text);
        current = [];
        continue;
      }

      const extended = [...current, unit];
      if (render(extended).length <= this.chunkSize) {
        current = extended;
        continue;
      }

      flush();
      const seeded = [...this.overlapTail(current), unit];
      current = render(seeded).length <= this.chunkSize ? seeded : [unit];
    }

    flush();
    return chunks;
  }

  private units(text: string): Unit[] {
    const units: Unit[] = [];
    const paragraphs = text
      .split(/\n\s*\n/)
      .map((paragraph) => paragraph.trim())
      .filter((paragraph) => paragraph.length > 0);

    for (const paragraph of paragraphs) {
      if (paragraph.length <= this.chunkSize) {
        units.push({ text: paragraph, sep: PARAGRAPH_SEPARATOR });
        continue;
      }

      const sentences = paragraph.split(/(?<=[.!?])\s+/).filter((sentence) => sentence.length > 0);
      sentences.forEach((sentence, index) => {
        units.push({ text: sentence, sep: index === sentences.length - 1 ? PARAGRAPH_SEPARATOR : SENTENCE_SEPARATOR });
      });
    }
    return units;
  }

  private overlapTail(units: Unit[]): Unit[] {
    if (this.chunkOverlap === 0) return [];
    const tail: Unit[] = [];
    for (let i = units.length - 1; i >= 0; i -= 1) {
      const unit = units[i];
      if (!unit) break;
      const candidate = [unit, ...tail];
      if (render(candidate).length > this.chunkOverlap) break;
      tail.unshift(unit);
    }
    return tail;
  }
}
