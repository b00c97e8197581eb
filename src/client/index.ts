import type { BridgeCallMessage, NativeToJsMessage } from "../index.ts";

// ─── Transport interface ──────────────────────────────────────────────────────

/**
 * Abstraction over the platform-specific message channel between JS and native.
 * Each platform implements send() (fire-and-forget) and call() (async reply).
 */
export interface BridgeTransport {
  /** Fire-and-forget — posts a message with no expectation of a reply. */
  send(msg: BridgeCallMessage): void;
  /** RPC call — returns a Promise that resolves/rejects with the native reply. */
  call(msg: BridgeCallMessage): Promise<unknown>;
  /** True when a native environment is detected and the transport is active. */
  readonly isNative: boolean;
}

// ─── WebKit Transport (WKScriptMessageHandlerWithReply) ──────────────────────
// Uses webkit.messageHandlers.pillbar.postMessage() for fire-and-forget and
// postMessageWithReply() for request/response calls such as getIntrinsicSize.

type WebKitHandler = {
  postMessage(msg: unknown): void;
  postMessageWithReply?(msg: unknown): Promise<unknown>;
};

type WebKitGlobal = typeof globalThis & {
  webkit?: {
    messageHandlers?: {
      pillbar?: WebKitHandler;
    };
  };
};

function getWebKitHandler(): WebKitHandler | undefined {
  return (globalThis as WebKitGlobal).webkit?.messageHandlers?.pillbar;
}

class WebKitTransport implements BridgeTransport {
  readonly isNative = true;

  send(msg: BridgeCallMessage): void {
    getWebKitHandler()?.postMessage(msg);
  }

  call(msg: BridgeCallMessage): Promise<unknown> {
    const handler = getWebKitHandler();
    if (!handler) {
      return Promise.reject(new Error("pillbar native handler not available"));
    }
    if (typeof handler.postMessageWithReply !== "function") {
      return Promise.reject(new Error("pillbar native handler does not support postMessageWithReply"));
    }

    return handler.postMessageWithReply(msg).then((reply) => {
      // Native replies { result } on success, { error } on failure
      const r = (reply ?? {}) as { result?: unknown; error?: string };
      if (r.error !== undefined) throw new Error(r.error);
      return r.result;
    });
  }
}

// ─── Web Transport (no native host) ──────────────────────────────────────────
// Outside a native shell every send is dropped and every call resolves with
// undefined, so bars keep their provisional size.

class WebTransport implements BridgeTransport {
  readonly isNative = false;
  send(_msg: BridgeCallMessage): void {
    // no-op
  }
  call(_msg: BridgeCallMessage): Promise<unknown> {
    return Promise.resolve(undefined);
  }
}

export function detectTransport(): BridgeTransport {
  if (getWebKitHandler()) return new WebKitTransport();
  return new WebTransport();
}

// ─── Method channels ─────────────────────────────────────────────────────────

export type MethodCall = {
  method: string;
  args: unknown;
};

export type MethodCallHandler = (call: MethodCall) => void;

/** One named, ordered message lane between a bar instance and its native view. */
export interface MethodChannel {
  readonly name: string;
  /** Fire-and-forget. Messages leave in call order. */
  invokeMethod(method: string, args?: unknown): void;
  /** Request/response round trip. */
  callMethod(method: string, args?: unknown): Promise<unknown>;
  /** Pass null to stop receiving inbound calls. */
  setMethodCallHandler(handler: MethodCallHandler | null): void;
}

export interface Bridge {
  readonly isNative: boolean;
  channel(name: string): MethodChannel;
  /** Entry point for native-to-JS messages. */
  receive(message: NativeToJsMessage): void;
}

// ─── Call ID generator ────────────────────────────────────────────────────────

let callIdCounter = 0;

function generateId(): string {
  return `pb_${(++callIdCounter).toString()}_${Date.now().toString()}`;
}

// ─── Bridge ──────────────────────────────────────────────────────────────────

/**
 * Creates a bridge over a transport. Inbound messages are routed by their
 * `namespace` to the handler of the channel with that name; messages for a
 * channel without a handler are dropped.
 *
 * @example
 * const bridge = createBridge()
 * const ch = bridge.channel("PillbarToolbar_1")
 * ch.invokeMethod("setTitle", { title: "Inbox" })
 */
export function createBridge(transport: BridgeTransport = detectTransport()): Bridge {
  const handlers = new Map<string, MethodCallHandler>();

  function channel(name: string): MethodChannel {
    return {
      name,
      invokeMethod(method, args) {
        transport.send({ id: null, type: "call", namespace: name, method, args: args ?? null });
      },
      callMethod(method, args) {
        return transport.call({
          id: generateId(),
          type: "call",
          namespace: name,
          method,
          args: args ?? null,
        });
      },
      setMethodCallHandler(handler) {
        if (handler) {
          handlers.set(name, handler);
        } else {
          handlers.delete(name);
        }
      },
    };
  }

  return {
    get isNative(): boolean {
      return transport.isNative;
    },
    channel,
    receive(message) {
      handlers.get(message.namespace)?.({ method: message.event, args: message.data });
    },
  };
}

// ─── Default bridge ──────────────────────────────────────────────────────────
// Created on first use so test doubles can be installed beforehand. Native
// delivers events by evaluating `pillbarReceive(message)` in the page.

let defaultBridge: Bridge | undefined;

export function getDefaultBridge(): Bridge {
  if (defaultBridge) return defaultBridge;
  const bridge = createBridge();
  (globalThis as unknown as Record<string, unknown>)["pillbarReceive"] = (
    message: NativeToJsMessage,
  ): void => {
    bridge.receive(message);
  };
  defaultBridge = bridge;
  return bridge;
}

/** @internal — For use in test beforeEach only. */
export function _resetDefaultBridge(): void {
  defaultBridge = undefined;
  delete (globalThis as unknown as Record<string, unknown>)["pillbarReceive"];
}
