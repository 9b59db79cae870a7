import { performance } from "perf_hooks";
import WebSocket from "ws";
import { Clock, ClientSocket, FrameScheduler, SocketFactory } from "./types";

const FRAME_INTERVAL_MS = 1000 / 60;

export const performanceClock: Clock = {
  now: () => performance.now(),
};

/**
 * Timer-driven stand-in for requestAnimationFrame when running under Node
 */
export function createTimerScheduler(intervalMs: number = FRAME_INTERVAL_MS): FrameScheduler {
  let nextHandle = 1;
  const timers = new Map<number, NodeJS.Timeout>();

  return {
    request(callback) {
      const handle = nextHandle++;
      timers.set(
        handle,
        setTimeout(() => {
          timers.delete(handle);
          callback();
        }, intervalMs)
      );
      return handle;
    },
    cancel(handle) {
      const timer = timers.get(handle);
      if (timer) {
        clearTimeout(timer);
        timers.delete(handle);
      }
    },
  };
}

export const wsSocketFactory: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);

  ws.on("open", () => handlers.onOpen());
  ws.on("message", (data) => handlers.onMessage(data.toString()));
  ws.on("close", (code, reason) => handlers.onClose(code, reason.toString()));
  ws.on("error", (error) => handlers.onError(error));

  const socket: ClientSocket = {
    send: (data) => ws.send(data),
    close: (code, reason) => ws.close(code, reason),
  };
  return socket;
};
