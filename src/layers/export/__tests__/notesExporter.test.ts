import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import type { Notes } from "../../../domain/models.js";
import {
  MarkdownNotesExporter,
  PdfNotesExporter,
  exporterFor,
  formatNotesAsMarkdown,
  writeExport
} from "../notesExporter.js";

const notes: Notes = {
  summary: "Gradient descent in one lecture.",
  keyConcepts: ["Learning rate", "Loss"],
  topics: [
    { name: "Optimization", description: "Walking downhill", keywords: ["gradient", "step"] },
    { name: "Evaluation", description: "Measuring loss", keywords: [] }
  ],
  detailedNotes: "## Optimization\n\n- Take small steps"
};

describe("formatNotesAsMarkdown", () => {
  it("lays out summary, concepts, numbered topics and details", () => {
    expect(formatNotesAsMarkdown(notes, "Week 3")).toBe(
      [
        "# Week 3",
        "",
        "## Summary",
        "Gradient descent in one lecture.",
        "",
        "## Key Concepts",
        "- Learning rate",
        "- Loss",
        "",
        "## Topics Covered",
        "",
        "### 1. Optimization",
        "Walking downhill",
        "**Keywords:** gradient, step",
        "",
        "### 2. Evaluation",
        "Measuring loss",
        "",
        "---",
        "",
        "## Detailed Notes",
        "",
        "## Optimization",
        "",
        "- Take small steps",
        ""
      ].join("\n")
    );
  });

  it("uses a default title", () => {
    expect(formatNotesAsMarkdown(notes).split("\n")[0]).toBe("# Lecture Notes");
  });
});

describe("writeExport", () => {
  it("adds the exporter's extension when the path has none", async () => {
    const directory = await mkdtemp(path.join(os.tmpdir(), "lecture-quiz-export-"));
    try {
      const written = await writeExport(new MarkdownNotesExporter(), notes, "Week 3", path.join(directory, "out", "notes"));

      expect(written).toBe(path.join(directory, "out", "notes.md"));
      expect(await readFile(written, "utf8")).toBe(formatNotesAsMarkdown(notes, "Week 3"));
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});

describe("PdfNotesExporter", () => {
  it("renders a PDF document", async () => {
    const payload = await new PdfNotesExporter().export(notes, "Week 3");

    expect(payload.subarray(0, 4).toString("latin1")).toBe("%PDF");
    expect(payload.subarray(-6).toString("latin1").trim()).toBe("%%EOF");
  });

  it("writes a .pdf file when the path has no extension", async () => {
    const directory = await mkdtemp(path.join(os.tmpdir(), "lecture-quiz-export-"));
    try {
      const written = await writeExport(new PdfNotesExporter(), notes, "Week 3", path.join(directory, "notes"));

      expect(written).toBe(path.join(directory, "notes.pdf"));
      expect((await readFile(written)).subarray(0, 4).toString("latin1")).toBe("%PDF");
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});

describe("exporterFor", () => {
  it("picks Markdown only for a .md target", () => {
    expect(exporterFor("notes.md")).toBeInstanceOf(MarkdownNotesExporter);
    expect(exporterFor("notes.MD")).toBeInstanceOf(MarkdownNotesExporter);
    expect(exporterFor("notes.pdf")).toBeInstanceOf(PdfNotesExporter);
    expect(exporterFor("notes")).toBeInstanceOf(PdfNotesExporter);
  });
});
