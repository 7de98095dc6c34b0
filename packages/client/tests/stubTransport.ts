import { JsonSerializer, type TransportRequestOptions } from '@esforge/transport';
import type { TransportLike } from '../src/base';

export type StubCall = {
  method: string;
  path: string;
  options: TransportRequestOptions;
};

export type StubHandler = (call: StubCall, index: number) => unknown;

export class StubTransport implements TransportLike {
  readonly serializer = new JsonSerializer();
  readonly calls: StubCall[] = [];
  closed = false;

  constructor(private readonly handler: StubHandler = () => ({})) {}

  async performRequest(method: string, path: string, options: TransportRequestOptions = {}): Promise<unknown> {
    const call = { method, path, options };
    this.calls.push(call);
    return this.handler(call, this.calls.length - 1);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
