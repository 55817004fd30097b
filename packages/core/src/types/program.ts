/**
 * @summary Opaque script and solution blobs.
 *
 * A Program is the unit the ledger evaluates: a coin's locking puzzle, or
 * the solution handed to it when the coin is spent. The wallet never looks
 * inside a puzzle it did not build; it only needs the bytes and their hash.
 * Programs built here are canonical JSON so that equal values always hash
 * identically.
 */

import { canonicalize, isJsonValue, type JsonValue } from "../utils/canonical-json.js";
import { bytesToHex, hexToBytes, sha256Hex, utf8ToBytes } from "../utils/hash.js";

export class Program {
  private readonly bytes: Uint8Array;
  private cachedHash: string | undefined;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  /**
   * Wrap raw serialized program bytes.
   */
  static fromBytes(bytes: Uint8Array): Program {
    return new Program(Uint8Array.from(bytes));
  }

  static fromHex(hex: string): Program {
    return new Program(hexToBytes(hex));
  }

  /**
   * Serialize a JSON value into a program.
   *
   * @example
   * const puzzle = Program.fromJson({ kind: "anyone_can_spend" });
   */
  static fromJson(value: JsonValue): Program {
    return new Program(utf8ToBytes(canonicalize(value)));
  }

  /**
   * Decode the program as JSON.
   *
   * @throws Error if the bytes are not a JSON document
   */
  toJson(): JsonValue {
    const text = new TextDecoder("utf-8", { fatal: true }).decode(this.bytes);
    const parsed: unknown = JSON.parse(text);
    if (!isJsonValue(parsed)) {
      throw new Error("Program does not decode to a JSON value");
    }
    return parsed;
  }

  /**
   * SHA256 of the serialized program (the "puzzle hash" for puzzles).
   */
  hash(): string {
    if (this.cachedHash === undefined) {
      this.cachedHash = sha256Hex(this.bytes);
    }
    return this.cachedHash;
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  toHex(): string {
    return bytesToHex(this.bytes);
  }

  equals(other: Program): boolean {
    return this.hash() === other.hash();
  }

  toString(): string {
    return `Program(${this.hash().slice(0, 16)}...)`;
  }
}
