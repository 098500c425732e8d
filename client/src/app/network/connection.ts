import WebSocket from "ws";
import { ConnectError, ReadError, WriteError } from "./errors.js";

/**
 * One open socket to the game server. Reads and writes are independent:
 * at most one read may be pending, while writes queue behind each other.
 */
export interface SessionConnection {
  readonly url: string;
  read(): Promise<string>;
  send(text: string): Promise<void>;
  close(): void;
}

type PendingRead = {
  resolve: (frame: string) => void;
  reject: (error: ReadError) => void;
};

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

class WsSessionConnection implements SessionConnection {
  private readonly frames: string[] = [];
  private pendingRead: PendingRead | null = null;
  private failure: ReadError | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    readonly url: string,
    private readonly socket: WebSocket
  ) {
    socket.on("message", (data) => {
      this.deliver(rawDataToString(data));
    });
    socket.on("close", (code, reason) => {
      const detail = reason.length > 0 ? `${code} ${reason.toString("utf8")}` : `${code}`;
      this.fail(new ReadError(`connection closed (${detail})`));
    });
    socket.on("error", (error) => {
      this.fail(new ReadError(error.message, error));
    });
  }

  read(): Promise<string> {
    const frame = this.frames.shift();
    if (frame !== undefined) return Promise.resolve(frame);
    if (this.failure) return Promise.reject(this.failure);
    if (this.pendingRead) {
      return Promise.reject(new ReadError("a read is already pending"));
    }
    return new Promise<string>((resolve, reject) => {
      this.pendingRead = { resolve, reject };
    });
  }

  send(text: string): Promise<void> {
    const result = this.writeChain.then(() => this.writeFrame(text));
    // The caller gets the rejection; the chain itself must keep going.
    this.writeChain = result.catch(() => undefined);
    return result;
  }

  close(): void {
    if (this.socket.readyState === WebSocket.CLOSED || this.socket.readyState === WebSocket.CLOSING) {
      return;
    }
    this.socket.close(1000, "client quit");
  }

  private writeFrame(text: string): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new WriteError("connection is not open"));
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.send(text, (error) => {
        if (error) {
          reject(new WriteError(error.message, error));
          return;
        }
        resolve();
      });
    });
  }

  private deliver(frame: string) {
    const pending = this.pendingRead;
    if (pending) {
      this.pendingRead = null;
      pending.resolve(frame);
      return;
    }
    this.frames.push(frame);
  }

  private fail(error: ReadError) {
    if (this.failure) return;
    this.failure = error;
    const pending = this.pendingRead;
    if (pending) {
      this.pendingRead = null;
      pending.reject(error);
    }
  }
}

/** Opens the socket once; there is no retry. */
export function connect(url: string): Promise<SessionConnection> {
  return new Promise<SessionConnection>((resolve, reject) => {
    let socket: WebSocket;
    try {
      socket = new WebSocket(url);
    } catch (error) {
      reject(new ConnectError(url, error));
      return;
    }

    const onOpen = () => {
      socket.off("error", onError);
      resolve(new WsSessionConnection(url, socket));
    };
    const onError = (error: Error) => {
      socket.off("open", onOpen);
      reject(new ConnectError(url, error));
    };

    socket.once("open", onOpen);
    socket.once("error", onError);
  });
}
