/**
 * In-process stand-in for the daemon's end of the Unix socket.
 *
 * Tests drive the client-visible socket events by hand and inspect what
 * the client wrote.
 */
import { EventEmitter } from "node:events";
import type { DaemonSocket, SocketConnector } from "../../src/connection.js";

export class FakeSocket extends EventEmitter implements DaemonSocket {
  written: string[] = [];
  ended = false;
  destroyed = false;
  /** When set, the next write reports this error through its callback. */
  failNextWrite: Error | null = null;

  write(data: string, callback: (err?: Error | null) => void): boolean {
    const err = this.failNextWrite;
    this.failNextWrite = null;
    if (!err) this.written.push(data);
    callback(err);
    return true;
  }

  end(): void {
    this.ended = true;
  }

  destroy(): void {
    this.destroyed = true;
  }

  /** Simulate the daemon accepting the connection */
  simulateConnect(): void {
    this.emit("connect");
  }

  /** Simulate bytes arriving from the daemon */
  simulateData(chunk: string | Buffer): void {
    this.emit("data", typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }

  /** Simulate an OS socket error such as ENOENT or ECONNREFUSED */
  simulateError(code: string, message = `connect ${code}`): void {
    const err: NodeJS.ErrnoException = new Error(message);
    err.code = code;
    this.emit("error", err);
  }

  simulateClose(hadError = false): void {
    this.emit("close", hadError);
  }
}

/**
 * A connector that hands out fresh FakeSockets and remembers the paths
 * it was asked to connect to.
 */
export function fakeConnector(): {
  connector: SocketConnector;
  sockets: FakeSocket[];
  paths: string[];
  last(): FakeSocket;
} {
  const sockets: FakeSocket[] = [];
  const paths: string[] = [];
  return {
    connector: (path) => {
      const socket = new FakeSocket();
      sockets.push(socket);
      paths.push(path);
      return socket;
    },
    sockets,
    paths,
    last() {
      const socket = sockets[sockets.length - 1];
      if (!socket) throw new Error("no socket was opened");
      return socket;
    },
  };
}
