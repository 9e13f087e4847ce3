// ⚠️ IMPORTANT: events carry their details in `meta` only.
// Every segmentation event meta includes `segmentation_version`.

export type LedgerEventKind =
  | "segmentation.pages_missing"
  | "segmentation.segment_classified"
  | "segmentation.completed";

export type LedgerEvent = {
  kind: LedgerEventKind;
  documentId: string | null;
  confidence?: number | null;
  requiresHumanReview?: boolean;
  meta: Record<string, unknown>;
};

/** Receives ledger events. Synchronous; may throw (writeEvent contains it). */
export type LedgerEventSink = (event: LedgerEvent) => void;

/** Meta larger than this is replaced by a truncation marker */
const MAX_META_CHARS = 50_000;

/** Default sink: structured console line. */
export const consoleSink: LedgerEventSink = (event) => {
  console.log("[ledger.writeEvent]", {
    kind: event.kind,
    documentId: event.documentId,
    confidence: event.confidence ?? null,
    requiresHumanReview: event.requiresHumanReview ?? false,
    meta: event.meta,
  });
};

/** Collects events in memory, for tests and in-process inspection. */
export function createMemorySink(): { sink: LedgerEventSink; events: LedgerEvent[] } {
  const events: LedgerEvent[] = [];
  return { sink: (event) => events.push(event), events };
}

function capMeta(meta: Record<string, unknown>): Record<string, unknown> {
  try {
    const s = JSON.stringify(meta);
    if (s.length > MAX_META_CHARS) {
      return { truncated: true, original_size: s.length };
    }
    return meta;
  } catch {
    return { truncated: true, unserializable: true };
  }
}

/**
 * Hand an event to the sink.
 * Never throws; returns { ok: boolean, error?: string }.
 */
export function writeEvent(
  event: LedgerEvent,
  sink: LedgerEventSink = consoleSink,
): { ok: boolean; error?: string } {
  try {
    sink({ ...event, meta: capMeta(event.meta) });
    return { ok: true };
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn("[ledger.writeEvent] sink failed (fail-open)", {
      kind: event.kind,
      documentId: event.documentId,
      error: message,
    });
    return { ok: false, error: message };
  }
}
