/**
 * TCP adapter. Stands in for an RFCOMM radio using plain TCP sockets.
 *
 * `listenOnce` opens a server on the configured host/port, accepts exactly
 * one connection and closes the server. `connectTo` dials `host:port`.
 * Socket open and close are reported as link events. The "radio" is always
 * on and no permissions are required.
 */

import { connect, createServer, type Socket } from "node:net";
import type { Disposable, DuplexChannel, PeerId } from "../channel/channel.js";
import { SocketChannel } from "../channel/socket.js";
import { classifyError, TransportError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { AdapterFacade, AttemptOptions, LinkEvent, PeerInfo } from "./adapter.js";

export interface TcpAdapterOptions {
  /** Address the listen server binds to. */
  host: string;
  port: number;
  /** Known peers, reported as bonded. */
  peers?: readonly PeerInfo[];
  logger?: Logger;
}

export class TcpAdapter implements AdapterFacade<unknown> {
  readonly #host: string;
  readonly #port: number;
  readonly #peers: readonly PeerInfo[];
  readonly #log: Logger;
  readonly #linkHandlers = new Set<(event: LinkEvent) => void>();

  constructor(opts: TcpAdapterOptions) {
    this.#host = opts.host;
    this.#port = opts.port;
    this.#peers = opts.peers ?? [];
    this.#log = (opts.logger ?? silentLogger).child("tcp");
  }

  isRadioEnabled(): boolean {
    return true;
  }

  onRadioChange(): Disposable {
    return { dispose: () => {} };
  }

  onLinkEvent(listener: (event: LinkEvent) => void): Disposable {
    this.#linkHandlers.add(listener);
    return { dispose: () => this.#linkHandlers.delete(listener) };
  }

  bondedPeers(): readonly PeerInfo[] {
    return this.#peers;
  }

  missingPermissions(): readonly string[] {
    return [];
  }

  listenOnce(serviceName: string, opts: AttemptOptions = {}): Promise<DuplexChannel<unknown>> {
    const { signal } = opts;

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new TransportError(`Listening for ${serviceName} cancelled`));
        return;
      }

      const server = createServer();
      const onAbort = () => {
        server.close();
        reject(new TransportError(`Listening for ${serviceName} cancelled`));
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      server.once("error", (err: Error) => {
        signal?.removeEventListener("abort", onAbort);
        server.close();
        reject(classifyError(err));
      });

      server.once("connection", (socket: Socket) => {
        signal?.removeEventListener("abort", onAbort);
        server.close();
        resolve(this.#wrap(socket, socketPeer(socket)));
      });

      server.listen(this.#port, this.#host, () => {
        this.#log.debug("Accepting one connection", {
          service: serviceName,
          address: `${this.#host}:${this.#port}`,
        });
      });
    });
  }

  connectTo(peerId: PeerId, opts: AttemptOptions = {}): Promise<DuplexChannel<unknown>> {
    const { signal } = opts;

    return new Promise((resolve, reject) => {
      let target: { host: string; port: number };
      try {
        target = parsePeerAddress(this.#resolvePeer(peerId));
      } catch (err) {
        reject(classifyError(err));
        return;
      }
      if (signal?.aborted) {
        reject(new TransportError(`Connect to ${peerId} cancelled`));
        return;
      }

      const socket = connect(target);
      const onAbort = () => {
        socket.destroy();
        reject(new TransportError(`Connect to ${peerId} cancelled`));
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      socket.once("error", (err: Error) => {
        signal?.removeEventListener("abort", onAbort);
        reject(classifyError(err));
      });
      socket.once("connect", () => {
        signal?.removeEventListener("abort", onAbort);
        resolve(this.#wrap(socket, peerId));
      });
    });
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  /** Bonded peers may be addressed by name. */
  #resolvePeer(peerId: PeerId): string {
    return this.#peers.find((p) => p.name === peerId)?.id ?? peerId;
  }

  #wrap(socket: Socket, peerId: PeerId): SocketChannel {
    this.#emit({ kind: "connected", peerId });
    socket.once("close", () => this.#emit({ kind: "disconnected", peerId }));
    return new SocketChannel(socket, peerId);
  }

  #emit(event: LinkEvent): void {
    this.#log.debug("Link event", event);
    for (const handler of this.#linkHandlers) {
      handler(event);
    }
  }
}

/** `host:port` of the remote end of an accepted socket. */
function socketPeer(socket: Socket): PeerId {
  return `${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? 0}`;
}

/** Split `host:port`; the host may itself contain colons (IPv6). */
export function parsePeerAddress(address: string): { host: string; port: number } {
  const idx = address.lastIndexOf(":");
  const host = idx > 0 ? address.slice(0, idx) : "";
  const port = Number(address.slice(idx + 1));
  if (!host || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new TransportError(`Invalid peer address "${address}" (expected host:port)`);
  }
  return { host: host.replace(/^\[(.*)\]$/, "$1"), port };
}
