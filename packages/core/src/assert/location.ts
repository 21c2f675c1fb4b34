import { fileURLToPath } from "node:url";

export interface SourceLocation {
  file: string;
  /** 1-indexed */
  line: number;
  column?: number;
}

const ENGINE_ROOT = fileURLToPath(new URL("..", import.meta.url));
const FRAME_PATTERN = /^\s*at (?:.*? \()?(.+?):(\d+):(\d+)\)?\s*$/;
const TEST_FILE_PATTERN = /\.(test|spec)\.[cm]?[jt]sx?$/;

export function parseStackFrame(line: string): SourceLocation | undefined {
  const match = FRAME_PATTERN.exec(line);
  if (!match) return undefined;
  const [, rawFile, lineNo, column] = match;
  const file = rawFile.startsWith("file://") ? fileURLToPath(rawFile) : rawFile;
  return { file, line: Number(lineNo), column: Number(column) };
}

function isEngineFrame(location: SourceLocation): boolean {
  return location.file.startsWith(ENGINE_ROOT) && !TEST_FILE_PATTERN.test(location.file);
}

function isInternalFrame(location: SourceLocation): boolean {
  return location.file.startsWith("node:") || location.file.includes("/node_modules/");
}

/**
 * Location of the first stack frame outside the engine, i.e. the line in the
 * test that made the failing call.
 */
export function locateCaller(stack: string | undefined = new Error().stack): SourceLocation | undefined {
  if (!stack) return undefined;
  for (const line of stack.split("\n").slice(1)) {
    const location = parseStackFrame(line);
    if (location && !isEngineFrame(location) && !isInternalFrame(location)) {
      return location;
    }
  }
  return undefined;
}
