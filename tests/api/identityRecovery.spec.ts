import { ZERO_MNEMONIC, countingSeed, filledSeed, silentLogger } from "../setup";
import { IdentityRecovery } from "../../src/api/IdentityRecovery";
import {
  BackupNotFoundError,
  DecryptionFailedError,
  InvalidMnemonicError,
  MissingIdentityError,
  ValidationError
} from "../../src/errors";
import { MemoryIdentityStore } from "../../src/storage/IdentityStore";
import { MemoryBackupTransport } from "../../src/transport/BackupTransport";

const PASS = "test-passphrase";

async function device(seed?: Uint8Array, transport?: MemoryBackupTransport) {
  const store = new MemoryIdentityStore();
  if (seed) await store.set(seed);
  const recovery = new IdentityRecovery({ identityStore: store, backupTransport: transport, logger: silentLogger });
  return { store, recovery };
}

async function storedBytes(store: MemoryIdentityStore): Promise<number[]> {
  return Array.from((await store.get()) ?? []);
}

describe("IdentityRecovery: export", () => {
  it("refuses to export without a stored identity", async () => {
    const { recovery } = await device();
    await expect(recovery.exportMnemonic()).rejects.toBeInstanceOf(MissingIdentityError);
    await expect(recovery.exportQrFrames()).rejects.toBeInstanceOf(MissingIdentityError);
  });

  it("exports the mnemonic and frames of the stored seed", async () => {
    const { recovery } = await device(filledSeed(0));
    expect(await recovery.exportMnemonic()).toBe(ZERO_MNEMONIC);
    expect(await recovery.exportQrFrames()).toEqual([
      `otp-e2ee-seed:1/3:${"abandon ".repeat(11)}abandon`,
      `otp-e2ee-seed:2/3:${"abandon ".repeat(11)}art`,
      "otp-e2ee-seed:3/3:check:33ad0a1c607ec03b"
    ]);
  });

  it("builds a carousel over the exported frames", async () => {
    const { recovery } = await device(filledSeed(0));
    const carousel = await recovery.createCarousel();
    expect(carousel.current()).toBe(`otp-e2ee-seed:1/3:${"abandon ".repeat(11)}abandon`);
    expect(carousel.isRunning()).toBe(false);
  });
});

describe("IdentityRecovery: mnemonic and QR transfer", () => {
  it("moves the seed through typed-in words", async () => {
    const source = await device(countingSeed());
    const target = await device();

    const words = await source.recovery.exportMnemonic();
    await target.recovery.importMnemonic(`  ${words.toUpperCase().replace(/ /g, "   ")}\n`);

    expect(await storedBytes(target.store)).toEqual(Array.from(countingSeed()));
  });

  it("stores nothing when the words do not verify", async () => {
    const target = await device();
    await expect(target.recovery.importMnemonic("abandon ".repeat(23) + "abandon")).rejects.toBeInstanceOf(
      InvalidMnemonicError
    );
    expect(await target.store.get()).toBeNull();
  });

  it("moves the seed through scanned frames in reverse order", async () => {
    const source = await device(countingSeed());
    const target = await device();

    const frames = await source.recovery.exportQrFrames();
    const session = target.recovery.createScanSession();
    for (const text of [...frames].reverse()) await session.submit(text);

    expect(session.getState()).toEqual({ kind: "succeeded" });
    expect(await storedBytes(target.store)).toEqual(Array.from(countingSeed()));
  });
});

describe("IdentityRecovery: passphrase backup", () => {
  it("uploads on one device and restores on another", async () => {
    const transport = new MemoryBackupTransport("alice");
    const source = await device(countingSeed(), transport);
    const target = await device(undefined, transport);

    await source.recovery.uploadBackup(PASS);
    await target.recovery.restoreBackup("alice", PASS);

    expect(await storedBytes(target.store)).toEqual(Array.from(countingSeed()));
  });

  it("leaves the store untouched on a wrong passphrase", async () => {
    const transport = new MemoryBackupTransport("alice");
    const source = await device(countingSeed(), transport);
    const target = await device(undefined, transport);

    await source.recovery.uploadBackup(PASS);
    await expect(target.recovery.restoreBackup("alice", "not-the-passphrase")).rejects.toBeInstanceOf(
      DecryptionFailedError
    );
    expect(await target.store.get()).toBeNull();
  });

  it("reports a missing backup", async () => {
    const { recovery } = await device(undefined, new MemoryBackupTransport("alice"));
    await expect(recovery.restoreBackup("bob", PASS)).rejects.toBeInstanceOf(BackupNotFoundError);
  });

  it("uses a fresh salt for every upload", async () => {
    const transport = new MemoryBackupTransport("alice");
    const { recovery } = await device(filledSeed(4), transport);

    await recovery.uploadBackup(PASS);
    const first = await transport.download("alice");
    await recovery.uploadBackup(PASS);
    const second = await transport.download("alice");

    expect(first?.params.salt).toHaveLength(24);
    expect(first?.params.salt).not.toBe(second?.params.salt);
    expect(first?.ciphertext).not.toBe(second?.ciphertext);
  });

  it("requires a transport for backup operations", async () => {
    const { recovery } = await device(countingSeed());
    await expect(recovery.uploadBackup(PASS)).rejects.toBeInstanceOf(ValidationError);
    await expect(recovery.restoreBackup("alice", PASS)).rejects.toBeInstanceOf(ValidationError);
  });

  it("refuses an upload without a stored identity", async () => {
    const { recovery } = await device(undefined, new MemoryBackupTransport("alice"));
    await expect(recovery.uploadBackup(PASS)).rejects.toBeInstanceOf(MissingIdentityError);
  });
});
