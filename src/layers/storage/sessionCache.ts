import { access, mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { InvalidVideoIdError, InvariantViolationError, MalformedResponseError } from "../../domain/errors.js";
import type { CachedSession, Notes, Question } from "../../domain/models.js";
import {
  parseNotesRecord,
  parseQuestionRecord,
  toNotesRecord,
  toQuestionRecord,
  type NotesRecord,
  type QuestionRecord
} from "../../domain/wireFormat.js";
import { asString, isObject } from "../../utils/json.js";

const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

interface SessionRecord {
  video_id: string;
  timestamp: string;
  transcript: string;
  notes: NotesRecord;
  questions: QuestionRecord[];
}

export function assertVideoId(videoId: string): string {
  if (!VIDEO_ID_PATTERN.test(videoId)) {
    throw new InvalidVideoIdError(videoId);
  }
  return videoId;
}

export function isMissingFileError(error: unknown): boolean {
  return isObject(error) && error.code === "ENOENT";
}

/**
 * Flat-file cache of transcript, notes and question pool, one JSON document per
 * video id. Entries never expire; concurrent writers overwrite each other.
 */
export class SessionCache {
  constructor(
    private readonly cacheDirectory: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  get directoryPath(): string {
    return this.cacheDirectory;
  }

  filePathFor(videoId: string): string {
    return path.join(this.cacheDirectory, `${assertVideoId(videoId)}.json`);
  }

  async exists(videoId: string): Promise<boolean> {
    try {
      await access(this.filePathFor(videoId));
      return true;
    } catch (error) {
      if (isMissingFileError(error)) {
        return false;
      }
      throw error;
    }
  }

  async save(videoId: string, transcript: string, notes: Notes, questions: Question[]): Promise<string> {
    const filePath = this.filePathFor(videoId);
    const record: SessionRecord = {
      video_id: videoId,
      timestamp: this.now().toISOString(),
      transcript,
      notes: toNotesRecord(notes),
      questions: questions.map(toQuestionRecord)
    };

    await mkdir(this.cacheDirectory, { recursive: true });
    await writeFile(filePath, JSON.stringify(record, null, 2), "utf8");
    console.log(`[cache] Saved ${questions.length} question(s) for ${videoId} -> ${filePath}`);
    return filePath;
  }

  async load(videoId: string): Promise<CachedSession | null> {
    const filePath = this.filePathFor(videoId);
    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }

    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (error) {
      throw new MalformedResponseError("cache", `Cache file ${filePath} is not valid JSON.`, raw, { cause: error });
    }

    return this.parseRecord(value, videoId, filePath, raw);
  }

  private parseRecord(value: unknown, videoId: string, filePath: string, raw: string): CachedSession {
    if (!isObject(value)) {
      throw new MalformedResponseError("cache", `Cache file ${filePath} does not contain a session object.`, raw);
    }

    const notes = parseNotesRecord(value.notes);
    if (!notes.ok) {
      throw new MalformedResponseError(
        "cache",
        `Cache file ${filePath} has incomplete notes (${notes.missingFields.join(", ")}).`,
        raw
      );
    }

    if (!Array.isArray(value.questions)) {
      throw new MalformedResponseError("cache", `Cache file ${filePath} has no question list.`, raw);
    }

    let questions: Question[];
    try {
      questions = value.questions.map((question: unknown) => parseQuestionRecord(question));
    } catch (error) {
      if (error instanceof InvariantViolationError) {
        throw new MalformedResponseError("cache", `Cache file ${filePath}: ${error.message}`, raw, { cause: error });
      }
      throw error;
    }

    return {
      videoId: asString(value.video_id, videoId) || videoId,
      timestamp: asString(value.timestamp),
      transcript: typeof value.transcript === "string" ? value.transcript : "",
      notes: notes.notes,
      questions
    };
  }
}
