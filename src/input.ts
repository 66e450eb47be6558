import fs from "node:fs";

import { assert } from "./assert.js";
import type { Position, RewindMode } from "./types.js";

// A saved cursor state. Restoring one puts the input back exactly where it was.
export interface InputIterator {
  readonly byte: number;
  readonly line: number;
  readonly column: number;
}

export interface ParseInput {
  readonly source: string;
  readonly byte: number;
  empty(): boolean;
  size(): number;
  peekChar(offset?: number): string | undefined;
  peekCode(offset?: number): number;
  bump(count?: number): void;
  position(): Position;
  iterator(): InputIterator;
  restore(it: InputIterator): void;
  slice(begin: number, end: number): string;
  mark(mode: RewindMode): Marker;
}

/**
 * A rewind point acquired for the duration of one match.
 *
 * Only a `required` marker saves the cursor: releasing it restores the saved
 * state unless the match was committed. An `active` marker relies on an
 * enclosing required marker to do the rewind, and a `dontcare` marker is held
 * by callers that never look at the position after a failure.
 *
 * Callers release in a `finally` block so a raised error still rewinds.
 */
export class Marker {
  readonly nextRewindMode: RewindMode;
  private saved: InputIterator | undefined;

  constructor(
    private readonly input: ParseInput,
    readonly mode: RewindMode,
  ) {
    this.nextRewindMode = mode === "required" ? "active" : mode;
    this.saved = mode === "required" ? input.iterator() : undefined;
  }

  commit(result: boolean): boolean {
    if (result) {
      this.saved = undefined;
    }
    return result;
  }

  release() {
    if (this.saved !== undefined) {
      this.input.restore(this.saved);
      this.saved = undefined;
    }
  }
}

export function formatPosition(pos: Position) {
  return `${pos.source}:${pos.line}:${pos.column}`;
}

export class MemoryInput implements ParseInput {
  byte = 0;
  line = 1;
  column = 1;

  constructor(
    public text: string,
    public source = "<memory>",
  ) {}

  empty() {
    return this.byte >= this.text.length;
  }

  size() {
    return this.text.length - this.byte;
  }

  peekChar(offset = 0): string | undefined {
    const i = this.byte + offset;
    return i < this.text.length ? this.text[i] : undefined;
  }

  peekCode(offset = 0) {
    const i = this.byte + offset;
    return i < this.text.length ? this.text.charCodeAt(i) : -1;
  }

  bump(count = 1) {
    assert(
      count >= 0 && count <= this.size(),
      `cannot consume ${count} of ${this.size()} remaining`,
    );
    for (let i = 0; i < count; i++) {
      if (this.text[this.byte++] === "\n") {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
    }
  }

  position(): Position {
    return {
      byte: this.byte,
      line: this.line,
      column: this.column,
      source: this.source,
    };
  }

  iterator(): InputIterator {
    return { byte: this.byte, line: this.line, column: this.column };
  }

  restore(it: InputIterator) {
    this.byte = it.byte;
    this.line = it.line;
    this.column = it.column;
  }

  slice(begin: number, end: number) {
    return this.text.slice(begin, end);
  }

  mark(mode: RewindMode) {
    return new Marker(this, mode);
  }
}

// Errors from the file system (ENOENT and friends) propagate unchanged.
export function fileInput(path: string) {
  return new MemoryInput(fs.readFileSync(path, "utf-8"), path);
}
