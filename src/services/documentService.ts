// src/services/documentService.ts
import { promises as fs, readFileSync } from "fs";
import path from "path";
import { Document, HeadingLevel, Packer, Paragraph } from "docx";
import type { Notice, Tender } from "../types/tender";

export const EOI_TEMPLATE_PATH = path.resolve(__dirname, "../../templates/eoi.txt");

export interface TemplateValues {
  recipient: string;
  title: string;
  sector_desc: string;
  summary: string;
  company: string;
}

export interface DocumentRequest {
  tenderId: number;
  title: string;
  kind: string;
  version?: number;
  body: string;
}

export interface DocumentResult {
  path: string | null;
  error: Notice | null;
}

export interface DocumentWriter {
  /** Resolves only once the artifact is completely on disk. */
  write(request: DocumentRequest): Promise<DocumentResult>;
}

let cachedTemplate: string | null = null;

export function loadEoiTemplate(): string {
  if (cachedTemplate === null) {
    cachedTemplate = readFileSync(EOI_TEMPLATE_PATH, "utf8");
  }
  return cachedTemplate;
}

export function templateValues(
  tender: Pick<Tender, "title" | "sector" | "description">,
  recipient: string,
  company: string
): TemplateValues {
  return {
    recipient,
    title: tender.title || "Untitled",
    sector_desc: (tender.sector || "Facilities Management").toLowerCase(),
    summary: tender.description.trim() || "—",
    company,
  };
}

/** Substitutes `{name}` placeholders; unknown placeholders are left as written. */
export function renderTemplate(template: string, values: TemplateValues): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => {
    switch (key) {
      case "recipient":
        return values.recipient;
      case "title":
        return values.title;
      case "sector_desc":
        return values.sector_desc;
      case "summary":
        return values.summary;
      case "company":
        return values.company;
      default:
        return match;
    }
  });
}

export function documentHeading(kind: string, version?: number): string {
  return version === undefined ? `${kind} Draft` : `${kind} Draft (v${version})`;
}

export function documentFileName(title: string, kind: string, version?: number): string {
  const safeTitle = (title || "Untitled").slice(0, 60).replace(/ /g, "_").replace(/[\\/]/g, "-");
  const suffix = version === undefined ? "" : `_v${version}`;
  return `${safeTitle}_${kind}${suffix}.docx`;
}

export async function buildDocx(request: DocumentRequest): Promise<Buffer> {
  const doc = new Document({
    sections: [
      {
        children: [
          new Paragraph({
            text: documentHeading(request.kind, request.version),
            heading: HeadingLevel.HEADING_1,
          }),
          ...request.body.split("\n").map((line) => new Paragraph({ text: line })),
        ],
      },
    ],
  });
  return Packer.toBuffer(doc);
}

/**
 * Writes `<dir>/<tenderId>/<file name>`. Titles are not unique, so each
 * tender gets its own folder.
 */
export class DocxDocumentWriter implements DocumentWriter {
  constructor(private readonly dir: string) {}

  async write(request: DocumentRequest): Promise<DocumentResult> {
    const folder = path.join(this.dir, String(request.tenderId));
    const target = path.join(folder, documentFileName(request.title, request.kind, request.version));
    const tmp = `${target}.tmp`;
    try {
      const buffer = await buildDocx(request);
      await fs.mkdir(folder, { recursive: true });
      await fs.writeFile(tmp, buffer);
      await fs.rename(tmp, target);
      return { path: target, error: null };
    } catch (err) {
      console.error("[DocumentWriter] Error generating document:", err);
      await fs.rm(tmp, { force: true }).catch((cleanupErr: unknown) => {
        console.warn("[DocumentWriter] could not remove", tmp, cleanupErr);
      });
      const reason = err instanceof Error ? err.message : String(err);
      return { path: null, error: { level: "error", message: `Error generating document: ${reason}` } };
    }
  }
}
