/**
 * Process I/O for commands. Commands take this instead of touching
 * process streams directly so tests can drive them in-process.
 */

export interface CommandIO {
  /** Read the whole of stdin. */
  readInput: () => Promise<Buffer>;
  /** Write raw output (stdout). */
  write: (data: string | Buffer) => void;
  /** Write one diagnostic line (stderr). */
  error: (line: string) => void;
}

async function readStdin(): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

export function processIO(): CommandIO {
  return {
    readInput: readStdin,
    write: (data) => {
      process.stdout.write(data);
    },
    error: (line) => console.error(line),
  };
}
