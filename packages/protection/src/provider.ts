// packages/protection/src/provider.ts
import { hkdfSync } from "crypto";
import { CompactEncrypt, compactDecrypt } from "jose";
import type {
  DataProtectionProvider,
  DataProtector,
} from "@schemekit/options-core";

export interface DataProtectionConfig {
  /** Root key material; every purpose key is derived from it. */
  masterKey: Uint8Array;
  /**
   * Isolates applications sharing a master key. Defaults to "schemekit".
   */
  applicationName?: string;
}

const MIN_MASTER_KEY_BYTES = 16;
const DERIVED_KEY_BYTES = 32;

/**
 * A protector is also a provider: `createProtector` on it extends its
 * purpose path.
 */
export interface NestedDataProtector extends DataProtector, DataProtectionProvider {
  createProtector(...purposes: string[]): NestedDataProtector;
}

class KeyRing {
  private readonly masterKey: Uint8Array;
  private readonly salt: string;
  private readonly derived = new Map<string, Uint8Array>();

  constructor(masterKey: Uint8Array, salt: string) {
    this.masterKey = masterKey;
    this.salt = salt;
  }

  keyFor(purposes: readonly string[]): Uint8Array {
    const info = purposes.join("\u0000");
    const existing = this.derived.get(info);
    if (existing) return existing;

    const key = new Uint8Array(
      hkdfSync("sha256", this.masterKey, this.salt, info, DERIVED_KEY_BYTES),
    );
    this.derived.set(info, key);
    return key;
  }
}

class JoseDataProtector implements NestedDataProtector {
  readonly purposes: readonly string[];
  private readonly ring: KeyRing;

  constructor(ring: KeyRing, purposes: readonly string[]) {
    this.ring = ring;
    this.purposes = purposes;
  }

  createProtector(...purposes: string[]): NestedDataProtector {
    return createChild(this.ring, [...this.purposes, ...purposes]);
  }

  async protect(plaintext: Uint8Array): Promise<string> {
    return new CompactEncrypt(plaintext)
      .setProtectedHeader({ alg: "dir", enc: "A256GCM" })
      .encrypt(this.ring.keyFor(this.purposes));
  }

  async unprotect(protectedData: string): Promise<Uint8Array> {
    const { plaintext } = await compactDecrypt(
      protectedData,
      this.ring.keyFor(this.purposes),
      { keyManagementAlgorithms: ["dir"], contentEncryptionAlgorithms: ["A256GCM"] },
    );
    return plaintext;
  }
}

function createChild(ring: KeyRing, purposes: string[]): NestedDataProtector {
  if (purposes.length === 0 || purposes.some((p) => !p)) {
    throw new Error("a protector needs at least one non-empty purpose");
  }
  return new JoseDataProtector(ring, purposes);
}

/**
 * Protection provider that emits compact JWE (`dir` + `A256GCM`) with a
 * key derived per purpose path (HKDF-SHA256).
 */
export function createDataProtectionProvider(
  config: DataProtectionConfig,
): { createProtector(...purposes: string[]): NestedDataProtector } & DataProtectionProvider {
  if (config.masterKey.length < MIN_MASTER_KEY_BYTES) {
    throw new Error(
      `data protection master key must be at least ${MIN_MASTER_KEY_BYTES} bytes`,
    );
  }

  const ring = new KeyRing(
    new Uint8Array(config.masterKey),
    config.applicationName ?? "schemekit",
  );

  return {
    createProtector: (...purposes: string[]) => createChild(ring, purposes),
  };
}
