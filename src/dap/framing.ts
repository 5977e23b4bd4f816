/**
 * DAP Wire Framing
 *
 * Content-Length framing shared by the debugger channel and the debug engine
 * socket:
 *
 *   Content-Length: <byte length>\r\n
 *   \r\n
 *   <body bytes>
 */

export const CONTENT_LENGTH_HEADER = "Content-Length: ";
export const HEADER_DELIMITER = "\r\n\r\n";

const LINE_FEED = 0x0a;

export class FramingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FramingError";
  }
}

/**
 * Frame a message body. The declared length is the UTF-8 byte count, not the
 * string length.
 */
export function encodeFrame(body: string): Buffer {
  const content = Buffer.from(body, "utf-8");
  const header = Buffer.from(`${CONTENT_LENGTH_HEADER}${content.length}${HEADER_DELIMITER}`, "ascii");
  return Buffer.concat([header, content]);
}

/**
 * Incremental frame decoder. Feed it chunks as they arrive, in any sizes; it
 * hands back each body once all of its bytes are in.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  /** Length announced by the header block currently being read */
  private declaredLength: number | null = null;
  /** Set once a header block has ended; the body is being awaited */
  private bodyLength: number | null = null;

  push(chunk: Buffer): string[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    const bodies: string[] = [];
    while (true) {
      if (this.bodyLength === null) {
        if (!this.readHeaderLine()) break;
        continue;
      }

      if (this.buffer.length < this.bodyLength) break;

      bodies.push(this.buffer.subarray(0, this.bodyLength).toString("utf-8"));
      this.buffer = this.buffer.subarray(this.bodyLength);
      this.bodyLength = null;
    }
    return bodies;
  }

  private readHeaderLine(): boolean {
    const newline = this.buffer.indexOf(LINE_FEED);
    if (newline === -1) return false;

    const line = this.buffer.subarray(0, newline).toString("ascii").trim();
    this.buffer = this.buffer.subarray(newline + 1);

    if (line.length > 0) {
      this.readHeader(line);
      return true;
    }

    // Blank line: the header block is over. Without a length there is no body.
    if (this.declaredLength !== null) {
      this.bodyLength = this.declaredLength;
    }
    this.declaredLength = null;
    return true;
  }

  private readHeader(line: string): void {
    const separator = line.indexOf(":");
    if (separator === -1) return;

    const name = line.slice(0, separator).trim().toLowerCase();
    if (name !== "content-length") return;

    const value = line.slice(separator + 1).trim();
    if (!/^\d+$/.test(value)) {
      throw new FramingError(`Invalid Content-Length header: ${line}`);
    }
    this.declaredLength = parseInt(value, 10);
  }
}

/**
 * Read frames off a byte stream until it ends. Empty bodies carry no message
 * and are skipped; end of stream simply ends the iteration.
 */
export async function* readFrames(stream: AsyncIterable<Buffer | string>): AsyncGenerator<string> {
  const decoder = new FrameDecoder();
  for await (const chunk of stream) {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk;
    for (const body of decoder.push(bytes)) {
      if (body.length > 0) yield body;
    }
  }
}
