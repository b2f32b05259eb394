import { ProblemRow } from './schemas';

export enum ProblemStatus {
  UNAVAILABLE = 0,
  NORMAL = 1,
  SPECIAL_JUDGE = 2,
}

export interface VerdictCounts {
  noVerdict: number;
  submissionError: number;
  cannotBeJudged: number;
  inQueue: number;
  compileError: number;
  restrictedFunction: number;
  runtimeError: number;
  outputLimit: number;
  timeLimit: number;
  memoryLimit: number;
  wrongAnswer: number;
  presentationError: number;
  accepted: number;
}

function numAt(row: ProblemRow, index: number): number {
  const value = row[index];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/**
 * ProblemInfo - A problem of the archive, built from one payload row
 *
 * Row layout: [pid, pnum, title, dacu, bestRuntime, bestMemory, nover, sube,
 * noj, inq, ce, rf, re, ole, tle, mle, wa, pe, ac, runtimeLimit, status]
 */
export class ProblemInfo {
  readonly pid: number;
  readonly pnum: number;
  readonly title: string;
  readonly dacu: number;
  readonly bestRuntime: number;
  readonly bestMemory: number;
  readonly verdicts: VerdictCounts;
  readonly runtimeLimit: number;
  readonly status: ProblemStatus;

  /** size of the cached statement file, 0 when absent */
  fileSize = 0;
  /** favourite flag */
  marked = false;

  constructor(row: ProblemRow) {
    this.pid = row[0];
    this.pnum = row[1];
    this.title = row[2];
    this.dacu = numAt(row, 3);
    this.bestRuntime = numAt(row, 4);
    this.bestMemory = numAt(row, 5);
    this.verdicts = {
      noVerdict: numAt(row, 6),
      submissionError: numAt(row, 7),
      cannotBeJudged: numAt(row, 8),
      inQueue: numAt(row, 9),
      compileError: numAt(row, 10),
      restrictedFunction: numAt(row, 11),
      runtimeError: numAt(row, 12),
      outputLimit: numAt(row, 13),
      timeLimit: numAt(row, 14),
      memoryLimit: numAt(row, 15),
      wrongAnswer: numAt(row, 16),
      presentationError: numAt(row, 17),
      accepted: numAt(row, 18),
    };
    this.runtimeLimit = numAt(row, 19);
    const status = numAt(row, 20);
    this.status =
      status === ProblemStatus.NORMAL || status === ProblemStatus.SPECIAL_JUDGE
        ? status
        : ProblemStatus.UNAVAILABLE;
  }

  get volume(): number {
    return Math.floor(this.pnum / 100);
  }

  get totalSubmissions(): number {
    return Object.values(this.verdicts).reduce((sum, count) => sum + count, 0);
  }
}
