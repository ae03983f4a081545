/**
 * JSON Score Store
 *
 * File-backed ResultRepository: one pretty-printed JSON file per record,
 * grouped in one directory per day:
 *
 *   <dir>/2026-02-22/001_Alice_ALG01.json
 *
 * Record ids continue from the number of records already on disk.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { createLogger, errorMessage, type Logger } from 'gradekit-core';
import type { GradedResult } from '../grading/types.js';
import type { ResultRepository, ScoreRecord, ScoreStats } from './types.js';

const ScoreBreakdownSchema = z.object({
  total: z.number(),
  logic: z.number(),
  algorithm: z.number(),
  style: z.number(),
  optimization: z.number(),
});

const ScoreRecordSchema = z.object({
  id: z.number(),
  studentId: z.string(),
  studentName: z.string(),
  assignmentCode: z.string().nullable(),
  filename: z.string(),
  totalScore: z.number().nullable(),
  breakdown: ScoreBreakdownSchema.nullable(),
  algorithms: z.array(z.string()),
  complexity: z.number(),
  status: z.enum(['PENDING', 'PASS', 'FAIL', 'FLAG']),
  reasoning: z.string(),
  improvement: z.string(),
  notes: z.array(z.string()),
  aiScored: z.boolean(),
  runtimeMs: z.number(),
  submittedAt: z.string(),
});

export interface JsonScoreStoreOptions {
  dir: string;
  /** Clock for submittedAt and the day directory (default: current time) */
  now?: () => Date;
  logger?: Logger;
}

/**
 * Split `"<id> - <name> | file"` or `"<name> | file"` into id and name.
 */
export function parseStudentInfo(filename: string): { studentId: string; studentName: string } {
  let studentId = 'anonymous';
  let studentName = 'Unknown';

  const separator = filename.indexOf(' | ');
  if (separator >= 0) {
    const info = filename.slice(0, separator);
    const dash = info.indexOf(' - ');
    if (dash >= 0) {
      studentId = info.slice(0, dash);
      studentName = info.slice(dash + 3);
    } else {
      studentName = info;
    }
  }

  return { studentId: studentId.trim(), studentName: studentName.trim() };
}

/**
 * File name of a record: zero-padded id, compacted student name, tag.
 */
export function recordFileName(id: number, studentName: string, assignmentCode: string | null): string {
  const safeName = studentName.replace(/\s+/g, '').replace(/[\\/]/g, '_').slice(0, 20);
  const tag = (assignmentCode || 'general').replace(/[\\/]/g, '_').slice(0, 15);
  return `${String(id).padStart(3, '0')}_${safeName}_${tag}.json`;
}

function dayDirName(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

export class JsonScoreStore implements ResultRepository {
  private readonly dir: string;
  private readonly now: () => Date;
  private readonly logger: Logger;
  /** Last id handed out; every save chains on it */
  private lastId: Promise<number> | null = null;

  constructor(options: JsonScoreStoreOptions) {
    this.dir = options.dir;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('score-store');
  }

  // ============================================
  // Write Operations
  // ============================================

  async saveBatch(results: GradedResult[], assignmentCode?: string): Promise<number[]> {
    const saved: number[] = [];
    for (const result of results) {
      const id = await this.save(result, assignmentCode ?? null);
      if (id !== null) {
        saved.push(id);
      }
    }
    return saved;
  }

  private async save(result: GradedResult, assignmentCode: string | null): Promise<number | null> {
    const id = await this.nextId();
    const now = this.now();
    const { studentId, studentName } = parseStudentInfo(result.name);

    const record: ScoreRecord = {
      id,
      studentId,
      studentName,
      assignmentCode,
      filename: result.name,
      totalScore: result.totalScore,
      breakdown: result.breakdown,
      algorithms: result.algorithms,
      complexity: result.complexity,
      status: result.status,
      reasoning: result.reasoning,
      improvement: result.improvement,
      notes: result.notes,
      aiScored: result.aiScored,
      runtimeMs: result.runtimeMs,
      submittedAt: now.toISOString(),
    };

    const dayDir = path.join(this.dir, dayDirName(now));
    const filePath = path.join(dayDir, recordFileName(id, studentName, assignmentCode));

    try {
      await fs.mkdir(dayDir, { recursive: true });
      await fs.writeFile(filePath, JSON.stringify(record, null, 2), 'utf-8');
      this.logger.info(`Saved #${id} -> ${filePath}`);
      return id;
    } catch (error) {
      this.logger.error(`Failed to save '${result.name}': ${errorMessage(error)}`);
      return null;
    }
  }

  private nextId(): Promise<number> {
    const previous = this.lastId ?? this.loadAll().then(records => records.length);
    const next = previous.then(id => id + 1);
    this.lastId = next;
    return next;
  }

  // ============================================
  // Read Operations
  // ============================================

  async getStudentScores(studentId: string): Promise<ScoreRecord[]> {
    const records = await this.loadAll();
    return records.filter(record => record.studentId === studentId);
  }

  /**
   * Records of one assignment, highest score first.
   */
  async getAssignmentScores(assignmentCode: string): Promise<ScoreRecord[]> {
    const records = await this.loadAll();
    return records
      .filter(record => record.assignmentCode === assignmentCode)
      .sort((a, b) => (b.totalScore ?? 0) - (a.totalScore ?? 0));
  }

  async getStats(assignmentCode?: string): Promise<ScoreStats> {
    let records = await this.loadAll();
    if (assignmentCode) {
      records = records.filter(record => record.assignmentCode === assignmentCode);
    }

    if (records.length === 0) {
      return { totalSubmissions: 0, avgScore: 0, maxScore: 0, minScore: 0, passed: 0, failed: 0, flagged: 0 };
    }

    const scores = records.map(record => record.totalScore ?? 0);
    return {
      totalSubmissions: records.length,
      avgScore: roundToTenth(scores.reduce((sum, score) => sum + score, 0) / scores.length),
      maxScore: Math.max(...scores),
      minScore: Math.min(...scores),
      passed: records.filter(record => record.status === 'PASS').length,
      failed: records.filter(record => record.status === 'FAIL').length,
      flagged: records.filter(record => record.status === 'FLAG').length,
    };
  }

  // ============================================
  // Internal Helpers
  // ============================================

  /**
   * Every readable record, ordered by day directory then file name.
   */
  private async loadAll(): Promise<ScoreRecord[]> {
    let days: string[];
    try {
      days = (await fs.readdir(this.dir, { withFileTypes: true }))
        .filter(entry => entry.isDirectory())
        .map(entry => entry.name)
        .sort();
    } catch {
      return [];
    }

    const records: ScoreRecord[] = [];
    for (const day of days) {
      const dayDir = path.join(this.dir, day);
      const files = (await fs.readdir(dayDir)).filter(file => file.endsWith('.json')).sort();

      for (const file of files) {
        try {
          const content = await fs.readFile(path.join(dayDir, file), 'utf-8');
          const parsed = ScoreRecordSchema.safeParse(JSON.parse(content));
          if (parsed.success) {
            records.push(parsed.data);
          } else {
            this.logger.warn(`Skipping malformed record '${file}'`);
          }
        } catch (error) {
          this.logger.warn(`Skipping unreadable record '${file}': ${errorMessage(error)}`);
        }
      }
    }
    return records;
  }
}
