import { ZERO_MNEMONIC, countingSeed, filledSeed, silentLogger } from "../setup";
import { MnemonicCodec } from "../../src/crypto/MnemonicCodec";
import { createSeed } from "../../src/crypto/seed";
import { FrameAssembler, type AssemblerState } from "../../src/qr/FrameAssembler";
import { QrFrameCodec } from "../../src/qr/QrFrameCodec";
import { MemoryIdentityStore, type IdentityStore } from "../../src/storage/IdentityStore";
import { ChecksumMismatchError, InvalidMnemonicError, PersistenceError } from "../../src/errors";

async function framesFor(seed: Uint8Array): Promise<string[]> {
  return QrFrameCodec.splitToText(MnemonicCodec.encode(seed), seed);
}

function newSession(store: IdentityStore = new MemoryIdentityStore()) {
  return { store, session: new FrameAssembler(store, { logger: silentLogger }) };
}

const ORDERS = [
  [0, 1, 2], [0, 2, 1], [1, 0, 2], [1, 2, 0], [2, 0, 1], [2, 1, 0]
];

describe("FrameAssembler: successful transfer", () => {
  it.each(ORDERS)("reassembles the zero seed in order %p, %p, %p", async (a, b, c) => {
    const texts = await framesFor(filledSeed(0));
    const { store, session } = newSession();

    expect(await session.submit(texts[a])).toEqual({ status: "accepted", index: a + 1, received: 1, total: 3 });
    expect(await session.submit(texts[b])).toEqual({ status: "accepted", index: b + 1, received: 2, total: 3 });
    expect(await session.submit(texts[c])).toEqual({ status: "succeeded" });

    expect(session.getState()).toEqual({ kind: "succeeded" });
    expect(Array.from((await store.get()) ?? [])).toEqual(Array.from(filledSeed(0)));
  });

  it("round-trips random seeds", async () => {
    for (const seed of [createSeed(), createSeed(), countingSeed()]) {
      const { store, session } = newSession();
      let status = "";
      for (const text of await framesFor(seed)) status = (await session.submit(text)).status;
      expect(status).toBe("succeeded");
      expect(Array.from((await store.get()) ?? [])).toEqual(Array.from(seed));
    }
  });

  it("ignores frames once the session has succeeded", async () => {
    const texts = await framesFor(countingSeed());
    const { session } = newSession();
    for (const t of texts) await session.submit(t);
    expect(await session.submit(texts[0])).toEqual({ status: "ignored" });
    expect(session.getState()).toEqual({ kind: "succeeded" });
  });
});

describe("FrameAssembler: idempotence and back-pressure", () => {
  it("treats a repeated index as a no-op, identical or not", async () => {
    const zero = await framesFor(filledSeed(0));
    const other = await framesFor(countingSeed());
    const { store, session } = newSession();

    await session.submit(zero[0]);
    const before = session.getState();
    expect(before).toEqual({ kind: "collecting", received: [1] });

    expect(await session.submit(zero[0])).toEqual({ status: "duplicate", index: 1 });
    expect(await session.submit(other[0])).toEqual({ status: "duplicate", index: 1 });
    expect(session.getState()).toBe(before);

    // the first payload is the one kept
    await session.submit(zero[1]);
    expect(await session.submit(zero[2])).toEqual({ status: "succeeded" });
    expect(Array.from((await store.get()) ?? [])).toEqual(Array.from(filledSeed(0)));
  });

  it("answers busy while the last frame is being validated", async () => {
    const texts = await framesFor(countingSeed());
    const { session } = newSession();
    await session.submit(texts[0]);
    await session.submit(texts[1]);

    const validating = session.submit(texts[2]);
    expect(session.getState()).toEqual({ kind: "validating", received: [1, 2, 3] });
    expect(await session.submit(texts[0])).toEqual({ status: "busy" });
    expect(await session.submit("garbage")).toEqual({ status: "busy" });

    expect(await validating).toEqual({ status: "succeeded" });
  });
});

describe("FrameAssembler: rejection", () => {
  it("rejects a mutated check frame with a checksum reason and returns to empty", async () => {
    const texts = await framesFor(filledSeed(0));
    expect(texts[2]).toBe("otp-e2ee-seed:3/3:check:33ad0a1c607ec03b");
    const tampered = "otp-e2ee-seed:3/3:check:43ad0a1c607ec03b";

    const { store, session } = newSession();
    const seen: AssemblerState["kind"][] = [];
    session.subscribe((s) => seen.push(s.kind));

    await session.submit(texts[0]);
    await session.submit(texts[1]);
    const outcome = await session.submit(tampered);

    expect(outcome).toMatchObject({ status: "rejected", reason: "checksum" });
    expect(outcome.status === "rejected" && outcome.error).toBeInstanceOf(ChecksumMismatchError);
    expect(session.getState()).toEqual({ kind: "empty" });
    expect(seen).toEqual(["collecting", "collecting", "validating", "rejected", "empty"]);
    expect(await store.get()).toBeNull();
  });

  it("lets the user rescan after a rejection", async () => {
    const texts = await framesFor(filledSeed(0));
    const { store, session } = newSession();
    await session.submit(texts[0]);
    await session.submit(texts[1]);
    await session.submit("otp-e2ee-seed:3/3:check:0000000000000000");

    for (const t of texts) await session.submit(t);
    expect(session.getState()).toEqual({ kind: "succeeded" });
    expect(Array.from((await store.get()) ?? [])).toEqual(Array.from(filledSeed(0)));
  });

  it("rejects word frames that do not decode, with a decode reason", async () => {
    const texts = await framesFor(filledSeed(0));
    const firstHalf = texts[0].slice("otp-e2ee-seed:1/3:".length);
    const secondHalf = texts[1].slice("otp-e2ee-seed:2/3:".length);

    const { store, session } = newSession();
    await session.submit(`otp-e2ee-seed:1/3:${secondHalf}`);
    await session.submit(`otp-e2ee-seed:2/3:${firstHalf}`);
    const outcome = await session.submit(texts[2]);

    expect(outcome).toMatchObject({ status: "rejected", reason: "decode" });
    expect(outcome.status === "rejected" && outcome.error).toBeInstanceOf(InvalidMnemonicError);
    expect(session.getState()).toEqual({ kind: "empty" });
    expect(await store.get()).toBeNull();
  });

  it("rejects a malformed frame with a format reason and drops held frames", async () => {
    const texts = await framesFor(countingSeed());
    const { session } = newSession();
    await session.submit(texts[0]);
    await session.submit(texts[2]);

    const outcome = await session.submit("otp-e2ee-seed:x/3:whatever");
    expect(outcome).toMatchObject({ status: "rejected", reason: "format" });
    expect(session.getState()).toEqual({ kind: "empty" });

    // frame 1 was dropped, so it is accepted again rather than reported as a duplicate
    expect(await session.submit(texts[0])).toEqual({ status: "accepted", index: 1, received: 1, total: 3 });
  });

  it("reports a failing identity store with a storage reason", async () => {
    const failing: IdentityStore = {
      get: async () => null,
      set: async () => {
        throw new Error("disk full");
      }
    };
    const texts = await framesFor(countingSeed());
    const { session } = newSession(failing);
    await session.submit(texts[0]);
    await session.submit(texts[1]);
    const outcome = await session.submit(texts[2]);

    expect(outcome).toMatchObject({ status: "rejected", reason: "storage" });
    expect(outcome.status === "rejected" && outcome.error).toBeInstanceOf(PersistenceError);
    expect(session.getState()).toEqual({ kind: "empty" });
  });
});

describe("FrameAssembler: abandonment", () => {
  it("never writes the seed once abandoned mid-validation", async () => {
    const texts = await framesFor(countingSeed());
    const { store, session } = newSession();
    await session.submit(texts[0]);
    await session.submit(texts[1]);

    const pending = session.submit(texts[2]);
    session.abandon();

    expect(await pending).toEqual({ status: "ignored" });
    expect(session.getState()).toEqual({ kind: "abandoned" });
    expect(await store.get()).toBeNull();
    expect(await session.submit(texts[0])).toEqual({ status: "ignored" });
  });

  it("stays abandoned when abandoned while the seed is being written", async () => {
    const pendingWrites: Array<() => void> = [];
    const set = jest.fn(
      (_seed: Uint8Array) =>
        new Promise<void>((resolve) => {
          pendingWrites.push(resolve);
        })
    );
    const slow: IdentityStore = { get: async () => null, set };
    const texts = await framesFor(countingSeed());
    const { session } = newSession(slow);
    await session.submit(texts[0]);
    await session.submit(texts[1]);

    const pending = session.submit(texts[2]);
    while (set.mock.calls.length === 0) {
      await new Promise((r) => setImmediate(r));
    }
    session.abandon();
    for (const finish of pendingWrites) finish();

    expect(await pending).toEqual({ status: "ignored" });
    expect(session.getState()).toEqual({ kind: "abandoned" });
  });

  it("stops notifying an unsubscribed listener", async () => {
    const texts = await framesFor(countingSeed());
    const { session } = newSession();
    const listener = jest.fn();
    const unsubscribe = session.subscribe(listener);
    await session.submit(texts[0]);
    unsubscribe();
    await session.submit(texts[1]);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ kind: "collecting", received: [1] });
  });
});

it("uses the zero mnemonic halves for the zero seed", async () => {
  const texts = await framesFor(filledSeed(0));
  expect(`${texts[0].split(":")[2]} ${texts[1].split(":")[2]}`).toBe(ZERO_MNEMONIC);
});
