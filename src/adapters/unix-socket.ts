import { createConnection, type Socket } from "node:net";
import { EditorConnectionError, RpcTimeoutError } from "../errors.js";

export interface SocketExchangeOptions {
  socketPath: string;
  timeoutMs: number;
  /** Operation name used in timeout errors. */
  operation: string;
}

/**
 * Run one request/response exchange over a fresh Unix-socket connection.
 * Connect and `run` share a single deadline; the socket is destroyed on every
 * exit path, including timeout. Socket errors at any stage reject with
 * EditorConnectionError.
 */
export async function withUnixSocket<T>(
  options: SocketExchangeOptions,
  run: (socket: Socket) => Promise<T>,
): Promise<T> {
  const socket = createConnection(options.socketPath);
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new RpcTimeoutError(options.operation, options.timeoutMs)),
      options.timeoutMs,
    );
  });
  const failed = new Promise<never>((_, reject) => {
    socket.on("error", (err) => reject(new EditorConnectionError(options.socketPath, { cause: err })));
  });
  const connected = new Promise<void>((resolve) => {
    socket.once("connect", () => resolve());
  });

  try {
    return await Promise.race([connected.then(() => run(socket)), failed, deadline]);
  } finally {
    clearTimeout(timer);
    socket.destroy();
  }
}
