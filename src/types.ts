// ── Tickets ─────────────────────────────────────────────────────────
// Immutable snapshot of a tracker issue. Never cached beyond the process.

export interface LinkedIssue {
  relation: string;
  key: string;
}

export interface ParentRef {
  key: string;
  summary: string;
}

export interface TicketRecord {
  key: string;
  summary: string;
  description: string;
  type: string;
  acceptanceCriteria?: string;
  status?: string;
  parent?: ParentRef;
  links: LinkedIssue[];
}

// Optional tracker fields are read through explicit presence checks.
export type Presence<T> =
  | { kind: 'present'; value: T }
  | { kind: 'absent' }
  | { kind: 'malformed'; reason: string };

// ── Knowledge base ──────────────────────────────────────────────────
// Chunks derived from ticket fields and the Definition of Done document.

export type ChunkSource = 'description' | 'acceptance_criteria' | 'definition_of_done';

export interface ChunkMetadata {
  source: ChunkSource;
  ticketKey?: string;
  chunkIndex: number;
}

export interface Chunk {
  text: string;
  metadata: ChunkMetadata;
}

export interface IndexEntry {
  chunk: Chunk;
  embedding: number[];
}

export interface ScoredChunk extends Chunk {
  score: number;
}

export interface SkippedField {
  ticketKey: string;
  field: string;
  reason: string;
}

export interface KnowledgeBaseSummary {
  generation: string;
  rootKey: string;
  ticketKeys: string[];
  chunkCount: number;
  skippedFields: SkippedField[];
  builtAt: string;
}

// ── Analysis ────────────────────────────────────────────────────────
// One result per target ticket. Failures are values, never thrown.

export const TICKET_CATEGORIES = [
  'General feature development',
  'Release (ROM/FW)',
  'Bug Fix',
  'Verification and Bring-up',
  'Tool Update',
  'Investigation/Concept Work',
  'RMA',
] as const;

export type AnalysisResult =
  | {
      status: 'ok';
      ticketKey: string;
      category: string;
      recommendation: string;
      context: ScoredChunk[];
      text: string;
    }
  | {
      status: 'error';
      ticketKey: string;
      error: string;
      text: string;
    };

export type ReviewResult =
  | {
      status: 'ok';
      ticketKey: string;
      stages: { analysis: string; refined: string; validated: string };
      commented: boolean;
      text: string;
    }
  | {
      status: 'error';
      ticketKey: string;
      error: string;
      text: string;
    };

// ── CLI Response ────────────────────────────────────────────────────
// Uniform JSON envelope for all CLI command output.

export interface CliResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}
