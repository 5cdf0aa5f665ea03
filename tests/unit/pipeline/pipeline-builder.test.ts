/**
 * @fileoverview Unit tests for PipelineBuilder and the combinators
 */

import {
  Handler,
  Middleware,
  Payload,
  RequestContext,
  branch,
  compose,
  createPipeline,
  forKinds,
  forTypes,
  noopLogger,
  ok,
} from '../../../src';

function tag(trace: string[], name: string): Middleware {
  return (next) => async (ctx, logger, payload) => {
    trace.push(name);
    return next(ctx, logger, payload);
  };
}

function payloadOf(kind: 'command' | 'query', type: string): Payload {
  return { data: {}, kind, type, metadata: {} };
}

describe('PipelineBuilder', () => {
  const ctx = RequestContext.create();
  let trace: string[];
  let handler: Handler;

  beforeEach(() => {
    trace = [];
    handler = async () => {
      trace.push('H');
      return ok();
    };
  });

  it('should return the handler itself when empty', () => {
    expect(createPipeline().compose(handler)).toBe(handler);
  });

  it('should apply middleware in insertion order', async () => {
    const composed = createPipeline()
      .use(tag(trace, 'A'), tag(trace, 'B'))
      .use(tag(trace, 'C'))
      .compose(handler);

    await composed(ctx, noopLogger, payloadOf('command', 'X'));

    expect(trace).toEqual(['A', 'B', 'C', 'H']);
  });

  it('should support conditional, prepended and inserted middleware', async () => {
    const pipeline = createPipeline()
      .use(tag(trace, 'B'))
      .useIf(false, tag(trace, 'skipped'))
      .useIf(() => true, tag(trace, 'D'))
      .prepend(tag(trace, 'A'))
      .insertAt(2, tag(trace, 'C'));

    expect(pipeline.length).toBe(4);
    await pipeline.compose(handler)(ctx, noopLogger, payloadOf('command', 'X'));

    expect(trace).toEqual(['A', 'B', 'C', 'D', 'H']);
  });

  it('should return a copy from build and empty on clear', () => {
    const pipeline = createPipeline().use(tag(trace, 'A'));

    pipeline.build().push(tag(trace, 'B'));
    expect(pipeline.length).toBe(1);

    pipeline.clear();
    expect(pipeline.length).toBe(0);
  });

  it('should compose through the shorthand', async () => {
    await compose(handler, tag(trace, 'A'), tag(trace, 'B'))(
      ctx,
      noopLogger,
      payloadOf('command', 'X'),
    );

    expect(trace).toEqual(['A', 'B', 'H']);
  });
});

describe('branch combinators', () => {
  const ctx = RequestContext.create();
  let trace: string[];
  let handler: Handler;

  beforeEach(() => {
    trace = [];
    handler = async () => {
      trace.push('H');
      return ok();
    };
  });

  it('should pick a side per payload', async () => {
    const composed = compose(
      handler,
      branch((p) => p.type === 'A', tag(trace, 'yes'), tag(trace, 'no')),
    );

    await composed(ctx, noopLogger, payloadOf('command', 'A'));
    await composed(ctx, noopLogger, payloadOf('command', 'B'));

    expect(trace).toEqual(['yes', 'H', 'no', 'H']);
  });

  it('should pass through without an else branch', async () => {
    const composed = compose(handler, branch(() => false, tag(trace, 'never')));

    await composed(ctx, noopLogger, payloadOf('command', 'A'));

    expect(trace).toEqual(['H']);
  });

  it('should filter by kind and by type', async () => {
    const composed = compose(
      handler,
      forKinds(['query'], tag(trace, 'query-only')),
      forTypes(['GetOrder'], tag(trace, 'get-order')),
    );

    await composed(ctx, noopLogger, payloadOf('command', 'GetOrder'));
    await composed(ctx, noopLogger, payloadOf('query', 'ListOrders'));

    expect(trace).toEqual(['get-order', 'H', 'query-only', 'H']);
  });
});
