/**
 * Minimal memcached text-protocol client: set, incr, get.
 */

import { Socket } from "node:net";

/**
 * The server answered with an error line.
 */
export class MemcachedError extends Error {
  constructor(
    message: string,
    public readonly reply: string,
  ) {
    super(message);
    this.name = "MemcachedError";
  }
}

interface PendingReply {
  /** Length of a complete reply at the head of the buffer, or -1 */
  complete: (buffer: string) => number;
  resolve: (reply: string) => void;
  reject: (error: Error) => void;
}

const CRLF = "\r\n";

function lineReply(buffer: string): number {
  const end = buffer.indexOf(CRLF);
  return end === -1 ? -1 : end + CRLF.length;
}

function retrievalReply(buffer: string): number {
  if (buffer.startsWith("END\r\n")) {
    return 5;
  }
  const header = /^VALUE \S+ \d+ (\d+)\r\n/.exec(buffer);
  if (header === null) {
    // Error lines end the reply as well.
    return buffer.startsWith("VALUE ") ? -1 : lineReply(buffer);
  }
  const bytes = Number(header[1]);
  const total = header[0].length + bytes + CRLF.length + "END\r\n".length;
  return buffer.length >= total ? total : -1;
}

function assertNotError(reply: string): void {
  if (/^(ERROR|CLIENT_ERROR|SERVER_ERROR)/.test(reply)) {
    throw new MemcachedError(`memcached replied ${reply.trim()}`, reply);
  }
}

/**
 * One connection to a memcached server. Requests are sent one at a time.
 */
export class MemcachedClient {
  #buffer = "";
  readonly #queue: PendingReply[] = [];
  #closed = false;

  private constructor(private readonly socket: Socket) {
    socket.setEncoding("utf-8");
    socket.on("data", (chunk: string) => {
      this.#buffer += chunk;
      this.#flush();
    });
    socket.on("error", (err) => {
      this.#failAll(err);
    });
    socket.on("close", () => {
      this.#closed = true;
      this.#failAll(new Error("memcached connection closed"));
    });
  }

  /**
   * Open a connection.
   *
   * @param host - Server host
   * @param port - Server port
   * @returns Connected client
   */
  static async connect(host: string, port: number): Promise<MemcachedClient> {
    return new Promise((resolve, reject) => {
      const socket = new Socket();
      const onError = (err: Error): void => {
        socket.destroy();
        reject(err);
      };
      socket.once("error", onError);
      socket.connect(port, host, () => {
        socket.off("error", onError);
        resolve(new MemcachedClient(socket));
      });
    });
  }

  /**
   * Store a value under a key.
   *
   * @param key - Key
   * @param value - Value to store
   */
  async set(key: string, value: string | number): Promise<void> {
    const data = String(value);
    const reply = await this.#request(
      `set ${key} 0 0 ${String(Buffer.byteLength(data))}${CRLF}${data}${CRLF}`,
      lineReply,
    );
    assertNotError(reply);
    if (!reply.startsWith("STORED")) {
      throw new MemcachedError(`set ${key} was not stored`, reply);
    }
  }

  /**
   * Increment a numeric value.
   *
   * @param key - Key
   * @param by - Increment
   * @returns New value, or null when the key does not exist
   */
  async incr(key: string, by = 1): Promise<number | null> {
    const reply = await this.#request(`incr ${key} ${String(by)}${CRLF}`, lineReply);
    assertNotError(reply);
    if (reply.startsWith("NOT_FOUND")) {
      return null;
    }
    return Number(reply.trim());
  }

  /**
   * Read a value.
   *
   * @param key - Key
   * @returns Stored value, or null when the key does not exist
   */
  async get(key: string): Promise<string | null> {
    const reply = await this.#request(`get ${key}${CRLF}`, retrievalReply);
    assertNotError(reply);
    const match = /^VALUE \S+ \d+ \d+\r\n([\s\S]*?)\r\nEND\r\n$/.exec(reply);
    return match?.[1] ?? null;
  }

  /**
   * Close the connection.
   */
  close(): void {
    this.socket.end();
  }

  async #request(
    payload: string,
    complete: (buffer: string) => number,
  ): Promise<string> {
    if (this.#closed) {
      throw new Error("memcached connection closed");
    }
    return new Promise((resolve, reject) => {
      this.#queue.push({ complete, resolve, reject });
      this.socket.write(payload);
    });
  }

  #flush(): void {
    let pending = this.#queue[0];
    while (pending !== undefined) {
      const length = pending.complete(this.#buffer);
      if (length === -1) {
        return;
      }
      const reply = this.#buffer.slice(0, length);
      this.#buffer = this.#buffer.slice(length);
      this.#queue.shift();
      pending.resolve(reply);
      pending = this.#queue[0];
    }
  }

  #failAll(error: Error): void {
    for (const pending of this.#queue.splice(0)) {
      pending.reject(error);
    }
  }
}
