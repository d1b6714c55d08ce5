import type { RankedOpportunity } from '../types/index.js';

// Sends one prompt to an external model and resolves with its raw text reply
export type TextProvider = (prompt: string) => Promise<string>;

export type PipelineStage = 'fetch' | 'hard-filter' | 'worthiness' | 'evidence' | 'judgment' | 'run';

export interface StageCounts {
  fetched: number;
  filtered: number;
  worthy: number;
  researched: number;
  judged: number;
  ranked: number;
}

export type PipelineResult =
  | { status: 'ok'; opportunities: RankedOpportunity[]; counts: StageCounts }
  | { status: 'empty'; counts: StageCounts }
  | { status: 'aborted'; stage: PipelineStage; reason: string; counts: StageCounts };
