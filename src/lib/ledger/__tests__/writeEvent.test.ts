import test from "node:test";
import assert from "node:assert/strict";
import { createMemorySink, writeEvent, type LedgerEvent } from "../writeEvent";

function event(meta: Record<string, unknown> = { segmentation_version: "v1.0" }): LedgerEvent {
  return { kind: "segmentation.completed", documentId: "doc-1", meta };
}

test("writeEvent: delivers the event to the sink", () => {
  const { sink, events } = createMemorySink();
  assert.deepEqual(writeEvent(event(), sink), { ok: true });
  assert.equal(events.length, 1);
  assert.deepEqual(events[0], event());
});

test("writeEvent: oversized meta is replaced by a truncation marker", () => {
  const { sink, events } = createMemorySink();
  writeEvent(event({ blob: "x".repeat(60_000) }), sink);
  // {"blob":"…"} adds 11 characters around the payload
  assert.deepEqual(events[0].meta, { truncated: true, original_size: 60_011 });
});

test("writeEvent: unserializable meta is marked", () => {
  const { sink, events } = createMemorySink();
  const circular: Record<string, unknown> = {};
  circular.self = circular;
  writeEvent(event(circular), sink);
  assert.deepEqual(events[0].meta, { truncated: true, unserializable: true });
});

test("writeEvent: a throwing sink is contained (fail-open)", () => {
  const result = writeEvent(event(), () => {
    throw new Error("sink down");
  });
  assert.deepEqual(result, { ok: false, error: "sink down" });
});
