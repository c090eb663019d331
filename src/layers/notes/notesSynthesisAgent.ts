import type { AgentRuntime } from "../../agents/runtime/agentRuntime.js";
import type { AgentStageResult } from "../../agents/runtime/stageResult.js";
import { MalformedNotesError, TranscriptTooShortError } from "../../domain/errors.js";
import type { Notes, NotesTopic } from "../../domain/models.js";
import { parseNotesRecord } from "../../domain/wireFormat.js";
import {
  chunkArray,
  extractKeywords,
  normalizeWhitespace,
  sentenceCase,
  splitSentences,
  summarizeText
} from "../../utils/text.js";

export const MIN_TRANSCRIPT_LENGTH = 100;

const NOTES_TEMPERATURE = 0.3;
const NOTES_MAX_OUTPUT_TOKENS = 4000;
const OFFLINE_TOPIC_LIMIT = 5;

const NOTES_SYSTEM_PROMPT = [
  "You are an expert educational content creator.",
  "Analyze lecture transcripts and create comprehensive, structured notes.",
  "Return ONLY valid JSON, no additional text before or after."
].join("\n");

export class NotesSynthesisAgent {
  constructor(private readonly runtime: AgentRuntime) {}

  async synthesize(transcript: string, videoId = "transcript"): Promise<AgentStageResult<Notes>> {
    const normalized = transcript.trim();
    if (normalized.length < MIN_TRANSCRIPT_LENGTH) {
      throw new TranscriptTooShortError(normalized.length, MIN_TRANSCRIPT_LENGTH);
    }

    const agentName = `notes-agent-${videoId}`;
    const run = await this.runtime.runJson<Notes>({
      stage: "notes",
      agentName,
      systemPrompt: NOTES_SYSTEM_PROMPT,
      userPrompt: buildNotesPrompt(normalized),
      temperature: NOTES_TEMPERATURE,
      maxOutputTokens: NOTES_MAX_OUTPUT_TOKENS,
      parse: (value, rawText) => {
        const result = parseNotesRecord(value);
        if (!result.ok) {
          throw new MalformedNotesError(result.missingFields, rawText);
        }
        return result.notes;
      },
      offline: () => buildOfflineNotes(normalized)
    });

    return {
      artifact: run.data,
      traces: [run.trace],
      rawResponses: run.rawText ? [{ stage: "notes", agentName, text: run.rawText }] : [],
      usage: run.usage
    };
  }
}

export function buildNotesPrompt(transcript: string): string {
  return `Analyze this lecture transcript and create comprehensive, structured notes.

TRANSCRIPT:
${transcript}

Please provide your response in the following JSON format (ensure valid JSON):
{
    "summary": "A 3-4 sentence overview of the entire lecture",
    "key_concepts": ["concept 1", "concept 2", "concept 3", ...],
    "topics": [
        {
            "name": "Topic Name",
            "description": "Brief description of this topic",
            "keywords": ["keyword1", "keyword2"]
        }
    ],
    "detailed_notes": "Comprehensive notes in markdown format with sections, subsections, and bullet points"
}

Requirements:
1. Summary: Capture the main purpose and key takeaways
2. Key Concepts: List 5-10 most important concepts/terms
3. Topics: Identify 5-8 major topics covered (these will be used for quiz categorization)
4. Detailed Notes: Well-organized markdown with:
   - Clear section headers (##)
   - Subsections (###)
   - Bullet points for key information
   - Important formulas, definitions, or code snippets if applicable

IMPORTANT: Return ONLY valid JSON, no additional text before or after.`;
}

/**
 * Deterministic notes for mock mode, built from sentence groups and keyword
 * frequency.
 */
export function buildOfflineNotes(transcript: string): Notes {
  const sentences = splitSentences(transcript);
  const groupSize = Math.max(1, Math.ceil(sentences.length / OFFLINE_TOPIC_LIMIT));
  const usedNames = new Set<string>();
  const sections: Array<{ topic: NotesTopic; sentences: string[] }> = [];

  chunkArray(sentences, groupSize).forEach((group, index) => {
    const keywords = extractKeywords(group.join(" "), 3);
    const candidate = sentenceCase(keywords.find((keyword) => !usedNames.has(keyword)) ?? `part ${index + 1}`);
    usedNames.add(candidate.toLowerCase());

    sections.push({
      topic: {
        name: candidate,
        description: summarizeText(group.join(" "), 1),
        keywords
      },
      sentences: group
    });
  });

  const keyConcepts = extractKeywords(transcript, 8).map(sentenceCase);

  return {
    summary: summarizeText(transcript, 3),
    keyConcepts: keyConcepts.length > 0 ? keyConcepts : ["Lecture overview"],
    topics: sections.map((section) => section.topic),
    detailedNotes: sections
      .map((section) =>
        [`## ${section.topic.name}`, "", ...section.sentences.map((sentence) => `- ${normalizeWhitespace(sentence)}`)].join(
          "\n"
        )
      )
      .join("\n\n")
  };
}
