import { randomBytes } from 'crypto';
import { formatTraceParent } from './trace-parent';

const TRACE_ID_BYTES = 16;
const SPAN_ID_BYTES = 8;

/**
 * Random lowercase hex id of `byteLength` bytes, drawn from the CSPRNG.
 * An all-zero id is invalid in W3C trace-context, so it is redrawn.
 */
function randomHexId(byteLength: number): string {
  for (;;) {
    const bytes = randomBytes(byteLength);
    if (bytes.some((b) => b !== 0)) return bytes.toString('hex');
  }
}

export const generateTraceId = (): string => randomHexId(TRACE_ID_BYTES);
export const generateSpanId = (): string => randomHexId(SPAN_ID_BYTES);

export interface TraceContextInit {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  traceFlags?: string;
  traceState?: string;
  tags?: ReadonlyMap<string, string>;
  baggage?: ReadonlyMap<string, string>;
}

/** One hop of a distributed trace as seen by this process. */
export class TraceContext {
  readonly traceId: string;
  readonly spanId: string;
  readonly parentSpanId?: string;
  readonly traceFlags: string;
  readonly traceState?: string;
  readonly tags: ReadonlyMap<string, string>;
  readonly baggage: ReadonlyMap<string, string>;

  constructor(init: TraceContextInit) {
    this.traceId = init.traceId;
    this.spanId = init.spanId;
    this.parentSpanId = init.parentSpanId;
    this.traceFlags = init.traceFlags ?? '00';
    this.traceState = init.traceState;
    this.tags = new Map(init.tags ?? []);
    this.baggage = new Map(init.baggage ?? []);
  }

  /** Starts a brand new trace with fresh trace and span ids. */
  static startNew(init: Omit<TraceContextInit, 'traceId' | 'spanId' | 'parentSpanId'> = {}): TraceContext {
    return new TraceContext({ ...init, traceId: generateTraceId(), spanId: generateSpanId() });
  }

  /** Starts a new span under an upstream (trace id, span id) pair. */
  static startChild(
    traceId: string,
    parentSpanId: string,
    init: Omit<TraceContextInit, 'traceId' | 'spanId' | 'parentSpanId'> = {},
  ): TraceContext {
    return new TraceContext({ ...init, traceId, parentSpanId, spanId: generateSpanId() });
  }

  /** Value for an outbound `traceparent` header pointing at this span. */
  toTraceParent(): string {
    return formatTraceParent(this.traceId, this.spanId, this.traceFlags);
  }
}

/**
 * Holder of the trace context that is current for one unit of work.
 * Owned by the caller (one per request in the Express binding), never global.
 */
export class TraceScope {
  private stack: TraceContext[] = [];

  get current(): TraceContext | undefined {
    return this.stack[this.stack.length - 1];
  }

  /** Makes `context` current; the returned function restores the previous one. */
  activate(context: TraceContext): () => void {
    this.stack.push(context);
    return () => {
      const index = this.stack.lastIndexOf(context);
      if (index >= 0) this.stack.splice(index, 1);
    };
  }
}
