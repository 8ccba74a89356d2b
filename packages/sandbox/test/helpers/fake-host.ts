import { nodeSocketPrimitives, type SocketPrimitives } from '@treblle-node/core';
import { REQUEST_KIND, type HostFunctions, type HostLogLevelValue, type MessageKind } from '../../src/index.js';

interface Message {
  headers: Record<string, string[]>;
  body: Uint8Array;
}

/** In-memory host holding one request/response pair. */
export class FakeHost implements HostFunctions {
  config: Record<string, unknown>;
  method = 'POST';
  uri = '/api/login';
  protocol = 'HTTP/1.1';
  status = 200;
  sourceAddress = '198.51.100.23:51234';
  features = 0;
  readonly logs: Array<{ level: HostLogLevelValue; message: string }> = [];
  readonly writes: Array<{ kind: MessageKind; body: string }> = [];
  readonly messages: [Message, Message] = [
    { headers: {}, body: new Uint8Array() },
    { headers: {}, body: new Uint8Array() },
  ];
  sockets?: SocketPrimitives;

  constructor(config: Record<string, unknown>) {
    this.config = config;
  }

  setRequest(headers: Record<string, string[]>, body = ''): this {
    this.messages[REQUEST_KIND] = { headers, body: new TextEncoder().encode(body) };
    return this;
  }

  setResponse(status: number, headers: Record<string, string[]>, body = ''): this {
    this.status = status;
    this.messages[1] = { headers, body: new TextEncoder().encode(body) };
    return this;
  }

  /** Routes every outbound connection to the IPv4 loopback. */
  useLoopback(): this {
    this.sockets = { resolve: async () => '127.0.0.1', connect: nodeSocketPrimitives.connect };
    return this;
  }

  log(level: HostLogLevelValue, message: string): void {
    this.logs.push({ level, message });
  }

  enableFeatures(features: number): number {
    this.features |= features;
    return this.features;
  }

  getConfig(): string {
    return JSON.stringify(this.config);
  }

  getMethod(): string {
    return this.method;
  }

  getUri(): string {
    return this.uri;
  }

  getProtocolVersion(): string {
    return this.protocol;
  }

  getHeaderNames(kind: MessageKind): string[] {
    return Object.keys(this.messages[kind].headers);
  }

  getHeaderValues(kind: MessageKind, name: string): string[] {
    return this.messages[kind].headers[name] ?? [];
  }

  readBody(kind: MessageKind): Uint8Array {
    return this.messages[kind].body;
  }

  writeBody(kind: MessageKind, body: Uint8Array): void {
    this.writes.push({ kind, body: new TextDecoder().decode(body) });
    this.messages[kind] = { ...this.messages[kind], body };
  }

  getStatusCode(): number {
    return this.status;
  }

  getSourceAddress(): string {
    return this.sourceAddress;
  }
}
