import type { DistillProposal, MemoryEvent, ProposedItem } from "../types";

const PREFERENCE_MARKERS = ["i prefer", "prefer ", "please", "always", "never", "remind me", "don't", "do not"];

export function looksLikePreference(text: string): boolean {
  const lowered = text.toLowerCase();
  return PREFERENCE_MARKERS.some((marker) => lowered.includes(marker));
}

function metadataTitle(event: MemoryEvent): string {
  const value = event.metadata?.title;
  return typeof value === "string" ? value.trim() : "";
}

/** `type=count` pairs sorted by type. */
export function summarizeEvents(events: readonly MemoryEvent[]): string {
  const counts = new Map<string, number>();
  for (const event of events) counts.set(event.type, (counts.get(event.type) ?? 0) + 1);
  return [...counts.entries()]
    .map(([type, count]) => `${type}=${count}`)
    .sort()
    .join(", ");
}

/**
 * Rule-based proposal used when no model is available or its output is
 * rejected. Items are keyed per category and ordered by key; updates are
 * always empty.
 */
export function fallbackProposal(events: readonly MemoryEvent[]): DistillProposal {
  const byKey = new Map<string, ProposedItem>();

  for (const event of events) {
    const text = (event.text ?? "").trim();
    if (!text) continue;

    switch (event.type) {
      case "decision_log": {
        const title = metadataTitle(event) || "Decision noted";
        byKey.set(`decision:${title}`, { kind: "decision", title, content: text, importance: 4, confidence: 0.9 });
        break;
      }
      case "error":
        byKey.set(`error:${text}`, { kind: "issue", title: "Recent error", content: text, importance: 4, confidence: 0.85 });
        break;
      case "user_message":
        if (looksLikePreference(text)) {
          byKey.set(`pref:${text}`, {
            kind: "preference",
            title: "User preference",
            content: text,
            importance: 3,
            confidence: 0.75,
          });
        }
        break;
      default:
        break;
    }
  }

  if (byKey.size === 0) {
    return {
      newItems: [
        {
          kind: "summary",
          title: "Checkpoint summary",
          content: `Checkpoint event summary: ${summarizeEvents(events)}`,
          importance: 2,
          confidence: 0.65,
        },
      ],
      updates: [],
    };
  }

  const keys = [...byKey.keys()].sort();
  return { newItems: keys.flatMap((key) => byKey.get(key) ?? []), updates: [] };
}
