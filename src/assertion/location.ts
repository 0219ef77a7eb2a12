/**
 * Where an assertion was written: file, line and, optionally, the enclosing
 * function.
 */
export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly func?: string;
};

/**
 * Builds a source location tag for an assertion.
 *
 * ```ts
 * assertThat(total).isEqualTo(4, { location: lineInfo('math.test.ts', 12) });
 * ```
 */
export function lineInfo(file: string, line: number, func?: string): SourceLocation {
  return func === undefined ? { file, line } : { file, line, func };
}

/**
 * Renders a location as `file:line` or `file:line func`.
 */
export function formatLocation(location: SourceLocation): string {
  const base = `${location.file}:${location.line}`;
  return location.func ? `${base} ${location.func}` : base;
}

// V8 frame shapes:
//   at functionName (/path/to/file.ts:12:5)
//   at /path/to/file.ts:12:5
const FRAME_WITH_FUNCTION = /^\s*at (.+?) \((.+):(\d+):\d+\)$/;
const FRAME_WITHOUT_FUNCTION = /^\s*at (.+):(\d+):\d+$/;

function parseFrame(frame: string): SourceLocation | undefined {
  const named = FRAME_WITH_FUNCTION.exec(frame);
  if (named) {
    const [, func, file, line] = named;
    if (func === undefined || file === undefined || line === undefined) return undefined;
    return lineInfo(file, Number(line), func);
  }

  const anonymous = FRAME_WITHOUT_FUNCTION.exec(frame);
  if (anonymous) {
    const [, file, line] = anonymous;
    if (file === undefined || line === undefined) return undefined;
    return lineInfo(file, Number(line));
  }

  return undefined;
}

/**
 * Captures the location of the code calling `captureLocation()`.
 *
 * Reads the V8 stack trace, so it returns `undefined` on engines that format
 * frames differently.
 *
 * @param depth - Extra frames to skip above the caller (for helpers that wrap
 *   this function).
 */
export function captureLocation(depth = 0): SourceLocation | undefined {
  const stack = new Error().stack;
  if (!stack) return undefined;

  // [0] "Error", [1] captureLocation, [2] the caller.
  const frame = stack.split('\n')[2 + depth];
  return frame === undefined ? undefined : parseFrame(frame);
}
