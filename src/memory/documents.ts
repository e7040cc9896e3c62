import type {
  CheckpointRecord,
  DistillProposal,
  EmbeddingStats,
  Health,
  MaintenanceReport,
  MemoryItem,
} from "../types";

export function itemDocument(item: MemoryItem) {
  return {
    id: item.id,
    agent_id: item.agentId,
    kind: item.kind,
    title: item.title,
    content: item.content,
    importance: item.importance,
    confidence: item.confidence,
    status: item.status,
    created_at: item.createdAt,
    updated_at: item.updatedAt,
  };
}

export type ItemDocument = ReturnType<typeof itemDocument>;

export function healthDocument(health: Health) {
  return {
    db_path: health.dbPath,
    db_size_bytes: health.dbSizeBytes,
    total_items: health.totalItems,
    active_items: health.activeItems,
    forgotten_items: health.forgottenItems,
    archived_items: health.archivedItems,
  };
}

export function embeddingStatsDocument(stats: EmbeddingStats) {
  return {
    vector_count: stats.vectorCount,
    active_vector_count: stats.activeVectorCount,
    models: stats.models,
  };
}

export function proposalDocument(proposal: DistillProposal) {
  return {
    new_items: proposal.newItems.map((item) => ({ ...item })),
    updates: proposal.updates.map((update) => ({
      id: update.id,
      new_content: update.newContent,
      confidence: update.confidence,
    })),
  };
}

export function checkpointRecordDocument(record: CheckpointRecord) {
  return {
    id: record.id,
    agent_id: record.agentId,
    created_at: record.createdAt,
    from_timestamp: record.fromTimestamp,
    to_timestamp: record.toTimestamp,
    event_count: record.eventCount,
    new_item_count: record.newItemCount,
    updated_item_count: record.updatedItemCount,
    summary: record.summary,
  };
}

export function maintenanceReportDocument(report: MaintenanceReport) {
  return {
    id: report.id,
    agent_id: report.agentId,
    created_at: report.createdAt,
    deduplicated_count: report.deduplicatedCount,
    archived_stale_count: report.archivedStaleCount,
    verification_count: report.verificationCount,
    compacted: report.compacted,
    before: healthDocument(report.before),
    after: healthDocument(report.after),
    verification_item_ids: report.verificationItemIds,
    archived_duplicate_ids: report.archivedDuplicateIds,
    archived_stale_ids: report.archivedStaleIds,
    metadata: report.metadata,
  };
}
