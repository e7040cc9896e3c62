export const EVENT_TYPES = [
  "user_message",
  "assistant_output",
  "tool_call",
  "tool_result",
  "error",
  "scheduler_run",
  "decision_log",
  "checkpoint",
  "maintenance",
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

export const MEMORY_STATUSES = ["active", "forgotten", "archived"] as const;

export type MemoryStatus = (typeof MEMORY_STATUSES)[number];

export interface MemoryEvent {
  id: string;
  type: EventType;
  timestamp: string;
  text?: string;
  sessionId?: string;
  runId?: string;
  metadata?: Record<string, unknown>;
}

export interface EventInput {
  id?: string;
  type: EventType;
  timestamp?: string | Date;
  text?: string;
  sessionId?: string;
  runId?: string;
  metadata?: Record<string, unknown>;
}

export interface MemoryItem {
  id: string;
  agentId: string;
  kind: string;
  title: string;
  content: string;
  importance: number;
  confidence: number;
  status: MemoryStatus;
  createdAt: string;
  updatedAt: string;
}

export interface MemoryItemInput {
  id?: string;
  agentId?: string;
  kind?: string;
  title?: string;
  content?: string;
  importance?: number;
  confidence?: number;
  status?: string;
}

export interface SearchParams {
  query?: string;
  limit?: number;
  minImportance?: number;
  status?: string;
}

export interface NormalizedSearchParams {
  query: string;
  limit: number;
  minImportance: number;
  status: MemoryStatus;
}

export type RecallMode = "fts" | "semantic_hybrid";

export interface RecallResult {
  items: MemoryItem[];
  mode: RecallMode;
  params: NormalizedSearchParams;
}

export interface Health {
  dbPath: string;
  dbSizeBytes: number;
  totalItems: number;
  activeItems: number;
  forgottenItems: number;
  archivedItems: number;
}

export interface EmbeddingStats {
  vectorCount: number;
  activeVectorCount: number;
  models: Record<string, number>;
}

export interface CheckpointRecord {
  id: string;
  agentId: string;
  createdAt: string;
  fromTimestamp: string;
  toTimestamp: string;
  eventCount: number;
  newItemCount: number;
  updatedItemCount: number;
  summary: string;
}

export interface MaintenanceReport {
  id: string;
  agentId: string;
  createdAt: string;
  deduplicatedCount: number;
  archivedStaleCount: number;
  verificationCount: number;
  compacted: boolean;
  before: Health;
  after: Health;
  verificationItemIds: string[];
  archivedDuplicateIds: string[];
  archivedStaleIds: string[];
  metadata: Record<string, unknown>;
}

export type DistillationMode = "model" | "deterministic_fallback";

export interface ProposedItem {
  kind: string;
  title: string;
  content: string;
  importance: number;
  confidence: number;
}

export interface ProposedUpdate {
  id: string;
  newContent: string;
  confidence: number;
}

export interface DistillProposal {
  newItems: ProposedItem[];
  updates: ProposedUpdate[];
}

export type Clock = () => Date;

export const MEMORY_TOOL_NAMES = [
  "memory.search",
  "memory.write",
  "memory.update",
  "memory.forget",
  "memory.health",
  "decision.log",
  "memory.checkpoint",
  "memory.maintenance",
] as const;

export type MemoryToolName = (typeof MEMORY_TOOL_NAMES)[number];
