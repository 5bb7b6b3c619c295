import { beforeEach, describe, expect, it, vi } from "vitest";
import { DeliveryError } from "../src/errors.js";
import { Notifier, createDryRunTransport, type NotificationTransport } from "../src/notifier.js";
import { listing } from "./helpers.js";

const now = () => new Date("2026-03-01T08:30:00.000Z");

function transport(send: (recipient: string, text: string) => Promise<void>): NotificationTransport & {
  texts: string[];
} {
  const texts: string[] = [];
  return {
    name: "fake",
    texts,
    async send(recipient, text) {
      texts.push(text);
      await send(recipient, text);
    },
  };
}

function notifier(t: NotificationTransport, sleep = vi.fn(async (_ms: number) => undefined)) {
  return { sleep, notifier: new Notifier(t, { recipient: "chat-1", area: "Creek Harbour", sleep, now }) };
}

const records = ["A", "B", "C"].map((id) => listing({ id, title: `Flat ${id}` }));

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

describe("Notifier", () => {
  it("sends one message per new listing in order", async () => {
    const t = transport(async () => undefined);

    const outcomes = await notifier(t).notifier.notify(records, false);

    expect(t.texts.map((text) => text.split("\n")[2])).toEqual(["Flat A", "Flat B", "Flat C"]);
    expect(outcomes).toEqual([
      { kind: "sent", listingId: "A", attempts: 1 },
      { kind: "sent", listingId: "B", attempts: 1 },
      { kind: "sent", listingId: "C", attempts: 1 },
    ]);
  });

  it("retries a failed send with doubling backoff", async () => {
    let failures = 2;
    const t = transport(async () => {
      if (failures-- > 0) throw new DeliveryError("Telegram API 502: Bad Gateway");
    });
    const { notifier: n, sleep } = notifier(t);

    const outcomes = await n.notify([records[0]], false);

    expect(outcomes).toEqual([{ kind: "sent", listingId: "A", attempts: 3 }]);
    expect(sleep.mock.calls).toEqual([[2000], [4000]]);
  });

  it("skips a listing after the last attempt and delivers the rest", async () => {
    const t = transport(async (_recipient, text) => {
      if (text.includes("Flat B")) throw new DeliveryError("Telegram API 400: Bad Request: chat not found");
    });

    const outcomes = await notifier(t).notifier.notify(records, false);

    expect(outcomes).toEqual([
      { kind: "sent", listingId: "A", attempts: 1 },
      { kind: "skipped", listingId: "B", attempts: 3, error: "Telegram API 400: Bad Request: chat not found" },
      { kind: "sent", listingId: "C", attempts: 1 },
    ]);
    expect(t.texts).toHaveLength(5);
  });

  it("treats any transport error as a delivery failure", async () => {
    const t = transport(async () => {
      throw new Error("socket hang up");
    });
    const n = new Notifier(t, { recipient: "chat-1", area: "Creek Harbour", maxAttempts: 1, now });

    expect(await n.notify([records[0]], false)).toEqual([
      { kind: "skipped", listingId: "A", attempts: 1, error: "socket hang up" },
    ]);
  });

  it("sends nothing for an empty run when the policy is off", async () => {
    const t = transport(async () => undefined);

    expect(await notifier(t).notifier.notify([], false)).toEqual([]);
    expect(t.texts).toEqual([]);
  });

  it("sends a single summary for an empty run when the policy is on", async () => {
    const t = transport(async () => undefined);

    const outcomes = await notifier(t).notifier.notify([], true);

    expect(outcomes).toEqual([{ kind: "sent", listingId: null, attempts: 1 }]);
    expect(t.texts).toEqual(["🏠 Creek Harbour check: no new listings found.\n\n⏰ Checked: 2026-03-01 08:30 UTC"]);
  });
});

describe("createDryRunTransport", () => {
  it("records messages instead of sending them", async () => {
    const t = createDryRunTransport();

    await new Notifier(t, { recipient: "test", area: "Creek Harbour", now }).notify([records[0]], false);

    expect(t.sent).toHaveLength(1);
    expect(t.sent[0].recipient).toBe("test");
  });
});
