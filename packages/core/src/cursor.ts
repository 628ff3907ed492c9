/**
 * Input cursor for @weft/core
 *
 * A cursor is an immutable position over a fully materialized input. Text
 * input is a `string`; token input is any array-like of elements. Line and
 * column are never stored: `locate()` derives them from the position when a
 * diagnostic is built, so backtracking can create cursors freely.
 */

/** Marker returned by `peek()` at end of input. */
export const END: unique symbol = Symbol("end of source");

/** Location of a position in text input. All fields are 0-based. */
export interface Location {
  readonly line: number;
  readonly column: number;
  /** The full text of the line containing the position, without its line break. */
  readonly lineText: string;
}

/** Bytes around a position in binary input, with a caret line under the byte at it. */
export interface ByteExcerpt {
  readonly text: string;
  readonly pointer: string;
}

const BYTES_BEFORE = 3;
const BYTES_AFTER = 10;

// Bracket and quote characters, word runs, punctuation runs, whitespace runs
const NEXT_TOKEN = /[()[\]{}"']|\w+|[^\w\s()[\]{}"']+|\s+/y;

export class Cursor<E> {
  readonly source: ArrayLike<E>;
  readonly position: number;

  constructor(source: ArrayLike<E>, position = 0) {
    if (!Number.isInteger(position) || position < 0 || position > source.length) {
      throw new RangeError(`Cursor position ${position} is outside 0..${source.length}`);
    }
    this.source = source;
    this.position = position;
  }

  atEnd(): boolean {
    return this.position >= this.source.length;
  }

  /** The element at the cursor, or `END`. */
  peek(): E | typeof END {
    return this.atEnd() ? END : this.source[this.position];
  }

  advance(): Cursor<E> {
    return this.drop(1);
  }

  drop(count: number): Cursor<E> {
    return count === 0 ? this : new Cursor(this.source, this.position + count);
  }

  /** Cursor at an absolute position over the same source. */
  at(position: number): Cursor<E> {
    return position === this.position ? this : new Cursor(this.source, position);
  }

  isText(): boolean {
    return typeof this.source === "string";
  }

  /**
   * Line, column and line text of the cursor position, or `undefined` for
   * token input.
   */
  locate(): Location | undefined {
    const source: ArrayLike<unknown> = this.source;
    if (typeof source !== "string") return undefined;

    const lineStart = this.position === 0 ? 0 : source.lastIndexOf("\n", this.position - 1) + 1;
    let lineEnd = source.indexOf("\n", this.position);
    if (lineEnd === -1) lineEnd = source.length;

    return {
      line: source.slice(0, lineStart).split("\n").length - 1,
      column: this.position - lineStart,
      lineText: source.slice(lineStart, lineEnd).replace(/\r$/, ""),
    };
  }

  /**
   * A few bytes either side of the cursor, or `undefined` unless the input is
   * a `Uint8Array`. Runs cut short are summarised by their byte count:
   *
   * ```
   * 2 bytes … C D E 00 F
   *                 ^^
   * ```
   */
  byteExcerpt(): ByteExcerpt | undefined {
    const source = this.source;
    if (!(source instanceof Uint8Array)) return undefined;

    const start = Math.max(0, this.position - BYTES_BEFORE);
    const end = Math.min(source.length, this.position + 1 + BYTES_AFTER);
    const before = Array.from(source.subarray(start, this.position), describeByte);
    if (start > 0) before.unshift(`${start} bytes …`);
    const after = Array.from(source.subarray(this.position + 1, end), describeByte);
    if (end < source.length) after.push(`… ${source.length - end} bytes`);
    const current = this.atEnd() ? "<EOF>" : describeByte(source[this.position]);

    const lead = before.join(" ");
    const offset = lead === "" ? 0 : lead.length + 1;
    return {
      text: [lead, current, after.join(" ")].filter((part) => part !== "").join(" "),
      pointer: " ".repeat(offset) + "^".repeat(current.length),
    };
  }

  /**
   * Human-readable description of what sits at the cursor. For text this is
   * the next token-like run of characters, quoted.
   */
  describeNext(): string {
    if (this.atEnd()) return "end of source";
    const source = this.source;
    if (typeof source === "string") {
      NEXT_TOKEN.lastIndex = this.position;
      const m = NEXT_TOKEN.exec(source);
      return JSON.stringify(m ? m[0] : source[this.position]);
    }
    if (source instanceof Uint8Array) return describeByte(source[this.position]);
    return describeElement(source[this.position]);
  }

  toString(): string {
    return `Cursor(${this.position}/${this.source.length})`;
  }
}

/** Description of a single input element for expectation and error messages. */
export function describeElement(element: unknown): string {
  return typeof element === "string" ? JSON.stringify(element) : String(element);
}

/** Printable ASCII as itself, anything else as two hex digits. */
export function describeByte(byte: number): string {
  return byte >= 33 && byte <= 126 ? String.fromCharCode(byte) : byte.toString(16).padStart(2, "0");
}

/** Text of the source between two positions, or its elements for token input. */
export function sliceText(source: ArrayLike<string>, start: number, end: number): string {
  if (typeof source === "string") return source.slice(start, end);
  return Array.from({ length: end - start }, (_, i) => source[start + i]).join("");
}

export function sliceElements<E>(source: ArrayLike<E>, start: number, end: number): E[] {
  return Array.from({ length: end - start }, (_, i) => source[start + i]);
}
