import { beforeEach, describe, expect, it, vi } from "vitest";

import { MalformedNotesError, TranscriptTooShortError } from "../../../domain/errors.js";
import { createTestRuntime } from "../../../test/fakes.js";
import { SAMPLE_NOTES, SAMPLE_NOTES_JSON, SAMPLE_TRANSCRIPT } from "../../../test/fixtures.js";
import { MIN_TRANSCRIPT_LENGTH, NotesSynthesisAgent, buildOfflineNotes } from "../notesSynthesisAgent.js";

describe("NotesSynthesisAgent", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  it("rejects a short transcript without calling the model", async () => {
    const { runtime, service } = createTestRuntime([SAMPLE_NOTES_JSON]);
    const agent = new NotesSynthesisAgent(runtime);

    await expect(agent.synthesize(`  ${"a".repeat(MIN_TRANSCRIPT_LENGTH - 1)}  `)).rejects.toBeInstanceOf(
      TranscriptTooShortError
    );
    expect(service.requests).toHaveLength(0);
  });

  it("returns parsed notes with the raw response", async () => {
    const { runtime, service } = createTestRuntime([SAMPLE_NOTES_JSON]);

    const result = await new NotesSynthesisAgent(runtime).synthesize(SAMPLE_TRANSCRIPT, "abc123");

    expect(result.artifact).toEqual(SAMPLE_NOTES);
    expect(result.rawResponses).toEqual([{ stage: "notes", agentName: "notes-agent-abc123", text: SAMPLE_NOTES_JSON }]);
    expect(result.usage.total).toBe(15);
    expect(service.requests[0].temperature).toBe(0.3);
    expect(service.requests[0].prompt).toContain(SAMPLE_TRANSCRIPT);
  });

  it("keeps code blocks inside fenced detailed notes", async () => {
    const notes = { ...SAMPLE_NOTES, detailedNotes: "## Code\n\n```js\nconsole.log(1)\n```" };
    const raw = `\`\`\`json\n${JSON.stringify({
      summary: notes.summary,
      key_concepts: notes.keyConcepts,
      topics: notes.topics,
      detailed_notes: notes.detailedNotes
    })}\n\`\`\``;
    const { runtime } = createTestRuntime([raw]);

    const result = await new NotesSynthesisAgent(runtime).synthesize(SAMPLE_TRANSCRIPT);

    expect(result.artifact).toEqual(notes);
  });

  it("names the fields a response leaves out", async () => {
    const raw = JSON.stringify({ summary: "Overview", key_concepts: ["One"] });
    const { runtime } = createTestRuntime([raw]);

    const error = await new NotesSynthesisAgent(runtime).synthesize(SAMPLE_TRANSCRIPT).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(MalformedNotesError);
    if (!(error instanceof MalformedNotesError)) {
      return;
    }
    expect(error.missingFields).toEqual(["topics", "detailed_notes"]);
    expect(error.rawText).toBe(raw);
  });
});

describe("buildOfflineNotes", () => {
  it("fills every field from the transcript", () => {
    const notes = buildOfflineNotes(SAMPLE_TRANSCRIPT);

    expect(notes.summary.length).toBeGreaterThan(0);
    expect(notes.keyConcepts.length).toBeGreaterThan(0);
    expect(notes.topics.map((topic) => topic.name)).toEqual(["Welcome", "Learning", "Layers"]);
    expect(notes.detailedNotes.startsWith(`## ${notes.topics[0].name}`)).toBe(true);
  });
});
