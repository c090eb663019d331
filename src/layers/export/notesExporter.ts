import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import PDFDocument from "pdfkit";

import type { Notes } from "../../domain/models.js";

export interface NotesExporter {
  readonly extension: string;
  export(notes: Notes, title: string): Promise<Buffer>;
}

export function formatNotesAsMarkdown(notes: Notes, title = "Lecture Notes"): string {
  const lines: string[] = [`# ${title}`, "", "## Summary", notes.summary, "", "## Key Concepts"];

  for (const concept of notes.keyConcepts) {
    lines.push(`- ${concept}`);
  }

  lines.push("", "## Topics Covered");
  notes.topics.forEach((topic, index) => {
    lines.push("", `### ${index + 1}. ${topic.name}`, topic.description);
    if (topic.keywords.length > 0) {
      lines.push(`**Keywords:** ${topic.keywords.join(", ")}`);
    }
  });

  lines.push("", "---", "", "## Detailed Notes", "", notes.detailedNotes, "");
  return lines.join("\n");
}

export class MarkdownNotesExporter implements NotesExporter {
  readonly extension = "md";

  async export(notes: Notes, title: string): Promise<Buffer> {
    return Buffer.from(formatNotesAsMarkdown(notes, title), "utf8");
  }
}

type PdfDocument = InstanceType<typeof PDFDocument>;

const BODY_FONT = "Helvetica";
const HEADING_FONT = "Helvetica-Bold";

export class PdfNotesExporter implements NotesExporter {
  readonly extension = "pdf";

  export(notes: Notes, title: string): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      const doc = new PDFDocument({ size: "A4", margin: 56, info: { Title: title } });
      const chunks: Buffer[] = [];
      doc.on("data", (chunk: Buffer) => chunks.push(chunk));
      doc.on("end", () => resolve(Buffer.concat(chunks)));
      doc.on("error", reject);

      doc.font(HEADING_FONT).fontSize(20).text(title);
      heading(doc, "Summary");
      body(doc, notes.summary);

      heading(doc, "Key Concepts");
      for (const concept of notes.keyConcepts) {
        body(doc, `\u2022 ${concept}`);
      }

      heading(doc, "Topics Covered");
      notes.topics.forEach((topic, index) => {
        doc.moveDown(0.5).font(HEADING_FONT).fontSize(12).text(`${index + 1}. ${topic.name}`);
        body(doc, topic.description);
        if (topic.keywords.length > 0) {
          doc.font(BODY_FONT).fontSize(10).fillColor("#555555").text(`Keywords: ${topic.keywords.join(", ")}`);
          doc.fillColor("black");
        }
      });

      heading(doc, "Detailed Notes");
      renderMarkdownLines(doc, notes.detailedNotes);

      doc.end();
    });
  }
}

function heading(doc: PdfDocument, text: string, size = 15): void {
  doc.moveDown().font(HEADING_FONT).fontSize(size).text(text);
}

function body(doc: PdfDocument, text: string): void {
  doc.font(BODY_FONT).fontSize(11).text(text);
}

// Headings and bullets only; other markup is written as plain text.
function renderMarkdownLines(doc: PdfDocument, markdown: string): void {
  for (const line of markdown.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed) {
      doc.moveDown(0.5);
    } else if (trimmed.startsWith("### ")) {
      heading(doc, trimmed.slice(4), 12);
    } else if (trimmed.startsWith("## ") || trimmed.startsWith("# ")) {
      heading(doc, trimmed.replace(/^#+\s/, ""), 13);
    } else if (/^[-*]\s/.test(trimmed)) {
      body(doc, `\u2022 ${trimmed.slice(2)}`);
    } else {
      body(doc, trimmed);
    }
  }
}

/** Markdown for a `.md` target, PDF otherwise. */
export function exporterFor(filePath: string): NotesExporter {
  return path.extname(filePath).toLowerCase() === ".md" ? new MarkdownNotesExporter() : new PdfNotesExporter();
}

export async function writeExport(
  exporter: NotesExporter,
  notes: Notes,
  title: string,
  filePath: string
): Promise<string> {
  const resolved = path.extname(filePath) ? filePath : `${filePath}.${exporter.extension}`;
  await mkdir(path.dirname(resolved), { recursive: true });
  await writeFile(resolved, await exporter.export(notes, title));
  return resolved;
}
