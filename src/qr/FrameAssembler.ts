import { hexToBytes } from "@noble/hashes/utils";
import { RECOVERY_CONSTANTS } from "../constants";
import { checksum } from "../crypto/ChecksumCalculator";
import { MnemonicCodec } from "../crypto/MnemonicCodec";
import {
  ChecksumMismatchError,
  InvalidMnemonicError,
  PersistenceError,
  RecoveryError,
  FormatError
} from "../errors";
import { componentLogger, type Logger } from "../logger";
import type { IdentityStore } from "../storage/IdentityStore";
import type { Seed } from "../types";
import { equalBytes, wipe } from "../utils/typedArray";
import { QrFrameCodec } from "./QrFrameCodec";

export type RejectReason = "format" | "checksum" | "decode" | "storage";

/**
 * Observable session state. Payloads never leave the assembler; only the held
 * indices are exposed.
 *
 * `rejected` is transient: listeners see it, then the session is back to `empty`.
 */
export type AssemblerState =
  | { kind: "empty" }
  | { kind: "collecting"; received: readonly number[] }
  | { kind: "validating"; received: readonly number[] }
  | { kind: "succeeded" }
  | { kind: "rejected"; reason: RejectReason }
  | { kind: "abandoned" };

export type ScanOutcome =
  | { status: "accepted"; index: number; received: number; total: number }
  | { status: "duplicate"; index: number }
  | { status: "busy" }
  | { status: "ignored" }
  | { status: "succeeded" }
  | { status: "rejected"; reason: RejectReason; error: RecoveryError };

export type StateListener = (state: AssemblerState) => void;

export interface FrameAssemblerOptions {
  logger?: Logger;
}

/**
 * Receiver side of the QR transfer: one instance per scanning attempt.
 *
 * @remarks
 * - Scan callbacks feed {@link submit}; it is the only consumer of frames.
 *   Parsing and insertion are synchronous, and the switch to `validating`
 *   happens before the first await, so two validations can never overlap.
 *   Frames arriving while validating get `busy` and are dropped.
 * - A repeated index is a no-op, whatever its payload.
 * - The seed reaches the {@link IdentityStore} only after the mnemonic decodes
 *   and the transfer checksum matches. Any failure discards every held frame.
 * - {@link abandon} ends the session; an in-flight validation then stops
 *   before writing.
 */
export class FrameAssembler {
  private state: AssemblerState = { kind: "empty" };
  private frames = new Map<number, string>();
  private readonly listeners = new Set<StateListener>();
  private readonly log: Logger;
  private readonly total = RECOVERY_CONSTANTS.QR.TOTAL_FRAMES;

  constructor(private readonly store: IdentityStore, opts?: FrameAssemblerOptions) {
    this.log = componentLogger("frame-assembler", opts?.logger);
  }

  getState(): AssemblerState {
    return this.state;
  }

  subscribe(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async submit(text: string): Promise<ScanOutcome> {
    switch (this.state.kind) {
      case "validating":
        return { status: "busy" };
      case "succeeded":
      case "abandoned":
        return { status: "ignored" };
      default:
        break;
    }

    let index: number;
    let payload: string;
    try {
      ({ index, payload } = QrFrameCodec.parseOne(text));
    } catch (e) {
      if (e instanceof FormatError) return this.reject("format", e);
      throw e;
    }

    if (this.frames.has(index)) {
      return { status: "duplicate", index };
    }

    this.frames.set(index, payload);
    const received = this.receivedIndices();
    this.log.debug({ index, received: received.length, total: this.total }, "frame accepted");

    if (this.frames.size < this.total) {
      this.transition({ kind: "collecting", received });
      return { status: "accepted", index, received: received.length, total: this.total };
    }

    this.transition({ kind: "validating", received });
    const frames = this.frames;
    this.frames = new Map();
    try {
      return await this.validate(frames);
    } catch (e) {
      if (!this.isAbandoned()) this.transition({ kind: "empty" });
      throw e;
    } finally {
      frames.clear();
    }
  }

  /** Drops held frames and ends the session for good. */
  abandon(): void {
    this.frames.clear();
    this.transition({ kind: "abandoned" });
  }

  private async validate(frames: Map<number, string>): Promise<ScanOutcome> {
    const wordFrames: string[] = [];
    for (let i = 1; i < this.total; i++) wordFrames.push(frames.get(i) ?? "");
    const checkPayload = frames.get(this.total) ?? "";
    const expected = hexToBytes(checkPayload.slice(RECOVERY_CONSTANTS.QR.CHECK_MARKER.length));

    let seed: Seed;
    try {
      seed = MnemonicCodec.decode(wordFrames.join(" "));
    } catch (e) {
      if (e instanceof InvalidMnemonicError) return this.reject("decode", e);
      throw e;
    }

    try {
      const actual = await checksum(seed);
      if (!equalBytes(actual, expected)) {
        return this.reject("checksum", new ChecksumMismatchError());
      }
      if (this.isAbandoned()) return { status: "ignored" };

      try {
        await this.store.set(seed);
      } catch (e) {
        const err = e instanceof RecoveryError
          ? e
          : new PersistenceError(`Failed to store identity: ${e instanceof Error ? e.message : String(e)}`);
        return this.reject("storage", err);
      }

      this.log.info("identity transfer verified and stored");
      if (this.isAbandoned()) return { status: "ignored" };
      this.transition({ kind: "succeeded" });
      return { status: "succeeded" };
    } finally {
      wipe(seed);
    }
  }

  private reject(reason: RejectReason, error: RecoveryError): ScanOutcome {
    this.frames.clear();
    this.log.warn({ reason }, "identity transfer rejected");
    if (!this.isAbandoned()) {
      this.transition({ kind: "rejected", reason });
      this.transition({ kind: "empty" });
    }
    return { status: "rejected", reason, error };
  }

  private isAbandoned(): boolean {
    return this.state.kind === "abandoned";
  }

  private receivedIndices(): number[] {
    return [...this.frames.keys()].sort((a, b) => a - b);
  }

  private transition(next: AssemblerState): void {
    this.state = next;
    for (const l of this.listeners) l(next);
  }
}
