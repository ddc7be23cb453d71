/**
 * Output sinks receive the strings emitted by `drainAndEmit`, one per line.
 */

export interface OutputSink {
  writeLine(line: string): void;
}

export interface MemorySink extends OutputSink {
  readonly lines: readonly string[];
  clear(): void;
}

/**
 * Writes each line, followed by a line terminator, to a writable stream
 */
export const createStreamSink = (
  stream: Pick<NodeJS.WritableStream, "write">,
): OutputSink => ({
  writeLine(line) {
    stream.write(`${line}\n`);
  },
});

export const stdoutSink: OutputSink = createStreamSink(process.stdout);

/**
 * Collects lines in memory; handy for tests and for capturing a drain
 */
export const createMemorySink = (): MemorySink => {
  const lines: string[] = [];
  return {
    lines,
    writeLine(line) {
      lines.push(line);
    },
    clear() {
      lines.length = 0;
    },
  };
};
