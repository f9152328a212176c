import { ToonDecodeError } from "./errors.js";

export interface ScannedLine {
  /** Text after the indentation */
  readonly content: string;
  /** Indentation in indent units, relative to column 0 */
  readonly depth: number;
  /** 1-based line number in the source */
  readonly lineNumber: number;
}

export interface ScanResult {
  readonly lines: readonly ScannedLine[];
  readonly blankLines: readonly number[];
}

const SPACE = " ";
const TAB = "\t";
const TAB_WIDTH = 4;

/**
 * Split a document into structural lines annotated with their depth.
 * Whitespace-only lines are only recorded by number.
 */
export function scan(text: string, indentSize: number, strict: boolean): ScanResult {
  const lines: ScannedLine[] = [];
  const blankLines: number[] = [];
  if (text === "") return { lines, blankLines };

  const rawLines = text.split("\n");
  // A final newline terminates the last line rather than opening a new one
  if (rawLines[rawLines.length - 1] === "") rawLines.pop();

  rawLines.forEach((raw, index) => {
    const lineNumber = index + 1;
    const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;

    if (line.trim() === "") {
      blankLines.push(lineNumber);
      return;
    }

    let units = 0;
    let pos = 0;
    while (pos < line.length && (line[pos] === SPACE || line[pos] === TAB)) {
      if (line[pos] === TAB) {
        if (strict) {
          throw new ToonDecodeError("Tabs are not allowed in indentation", {
            line: lineNumber,
            code: "TAB_INDENT",
          });
        }
        units += TAB_WIDTH;
      } else {
        units++;
      }
      pos++;
    }

    if (strict && units % indentSize !== 0) {
      throw new ToonDecodeError(
        `Indentation must be a multiple of ${indentSize} spaces (found ${units})`,
        { line: lineNumber, code: "INDENT_MULTIPLE" },
      );
    }

    lines.push({ content: line.slice(pos), depth: Math.floor(units / indentSize), lineNumber });
  });

  return { lines, blankLines };
}

/** Read position over an immutable list of scanned lines. */
export class LineCursor {
  private index = 0;

  constructor(private readonly lines: readonly ScannedLine[]) {}

  get length(): number {
    return this.lines.length;
  }

  atEnd(): boolean {
    return this.index >= this.lines.length;
  }

  peek(): ScannedLine | undefined {
    return this.lines[this.index];
  }

  advance(): void {
    if (!this.atEnd()) this.index++;
  }
}
