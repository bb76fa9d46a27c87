import { describe, it, expect } from 'vitest';
import { ToolDispatcher, describeOutcome, outcomeResult } from '../dispatcher.js';
import { createToolSpec } from '../spec.js';
import { inventorySqlTool } from '../inventory-sql-tool.js';
import { blueprintVisionTool } from '../blueprint-vision-tool.js';
import { createWebSearchTool } from '../web-search-tool.js';
import { ResidencyScheduler } from '../../gpu/residency-scheduler.js';
import { AppError, ErrorCode } from '../../../utils/errors.js';
import {
  FakeSwapper,
  FakeTransport,
  TEST_ASSIGNMENTS,
  TEST_SLOTS,
  delay,
  hangingSwap,
  silentLogger,
  type TransportHandler,
} from '../../../__tests__/fakes.js';

const options = { skillsBaseUrl: 'http://skills.test', defaultTimeoutMs: 1000 };

function setup(handler: TransportHandler, swapper: FakeSwapper = new FakeSwapper(), swapTimeoutMs: number = 1000) {
  const scheduler = new ResidencyScheduler({
    slots: TEST_SLOTS,
    assignments: TEST_ASSIGNMENTS,
    swapper,
    swapTimeoutMs,
    logger: silentLogger(),
  });
  const transport = new FakeTransport(handler);
  const dispatcher = new ToolDispatcher(scheduler, transport, silentLogger());
  return { scheduler, transport, dispatcher, swapper };
}

/** Rejects once the signal aborts, the way fetch does */
const hangingCall: TransportHandler = (_url, _request, signal) =>
  new Promise((_resolve, reject) => {
    if (signal.aborted) reject(signal.reason);
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });

describe('ToolDispatcher', () => {
  it('acquires residency, calls the endpoint and summarizes the result', async () => {
    const { dispatcher, transport, scheduler, swapper } = setup(async () => ({
      answer: '250 kg PA6 in stock',
      rows_count: 1,
    }));
    const spec = createToolSpec(inventorySqlTool, options);

    const invocation = await dispatcher.invoke(spec, { question: 'PA6 stock?' });

    expect(invocation.toolName).toBe('inventory_sql_search');
    expect(invocation.input).toEqual({ question: 'PA6 stock?' });
    expect(invocation.outcome).toEqual({
      status: 'success',
      result: { answer: '250 kg PA6 in stock', rows_count: 1 },
      summary: '250 kg PA6 in stock (1 row)',
    });
    expect(transport.calls).toEqual([
      { url: 'http://skills.test/skills/inventory-sql', request: { body: { question: 'PA6 stock?' } } },
    ]);
    expect(swapper.requests.map(r => r.to)).toEqual(['test-llm']);
    expect(scheduler.snapshot()[0]?.busy).toBe(false);
  });

  it('rejects invalid input without calling the tool', async () => {
    const { dispatcher, transport } = setup(async () => ({}));
    const spec = createToolSpec(inventorySqlTool, options);

    const invocation = await dispatcher.invoke(spec, { query: 'wrong field' });

    expect(invocation.outcome.status).toBe('rejected');
    expect(transport.calls).toHaveLength(0);
  });

  it('skips residency for tools that need no model', async () => {
    const { dispatcher, swapper } = setup(async () => ({ organic: [{}, {}] }));
    const spec = createToolSpec(createWebSearchTool('https://search.test/search', 'test-secret'), options);

    const invocation = await dispatcher.invoke(spec, { query: 'PA6 datasheet' });

    expect(invocation.outcome).toMatchObject({ status: 'success', summary: 'Found 2 web results' });
    expect(swapper.requests).toHaveLength(0);
  });

  it('reports a swap timeout as a rejection and never calls the tool', async () => {
    const { dispatcher, transport, scheduler } = setup(async () => ({}), new FakeSwapper(hangingSwap), 20);
    const spec = createToolSpec(blueprintVisionTool, options);

    const invocation = await dispatcher.invoke(spec, { image_path: '/data/shaft.png' });

    expect(invocation.outcome).toEqual({
      status: 'rejected',
      error: ErrorCode.SWAP_TIMEOUT,
      reason: 'Loading test-vlm on slot gpu0 exceeded 0s',
    });
    expect(transport.calls).toHaveLength(0);
    expect(scheduler.snapshot()[0]?.busy).toBe(false);
  });

  it('maps transport failures to transport_error', async () => {
    const { dispatcher, scheduler } = setup(async () => {
      throw AppError.toolTransport('Tool endpoint returned HTTP 500', { status: 500 });
    });
    const spec = createToolSpec(inventorySqlTool, options);

    const invocation = await dispatcher.invoke(spec, { question: 'PA6 stock?' });

    expect(invocation.outcome).toEqual({
      status: 'transport_error',
      error: ErrorCode.TOOL_TRANSPORT_ERROR,
      reason: 'Tool endpoint returned HTTP 500',
    });
    expect(scheduler.snapshot()[0]?.busy).toBe(false);
  });

  it('times out when the tool exceeds its budget', async () => {
    const { dispatcher, scheduler } = setup(hangingCall);
    const spec = createToolSpec(inventorySqlTool, { ...options, defaultTimeoutMs: 30 });

    const invocation = await dispatcher.invoke(spec, { question: 'PA6 stock?' });

    expect(invocation.outcome).toEqual({
      status: 'timeout',
      error: ErrorCode.TOOL_TIMEOUT,
      reason: 'inventory_sql_search did not respond within 0s',
      cancelled: false,
    });
    expect(scheduler.snapshot()[0]?.busy).toBe(false);
  });

  it('reports caller cancellation as a cancelled timeout', async () => {
    const { dispatcher } = setup(hangingCall);
    const spec = createToolSpec(createWebSearchTool('https://search.test/search', 'test-secret'), options);
    const controller = new AbortController();

    const pending = dispatcher.invoke(spec, { query: 'PA6' }, { signal: controller.signal });
    controller.abort();
    const invocation = await pending;

    expect(invocation.outcome).toEqual({
      status: 'timeout',
      error: ErrorCode.TOOL_TIMEOUT,
      reason: 'cancelled',
      cancelled: true,
    });
  });

  it('releases GPU residency when a model-backed call is cancelled', async () => {
    const { dispatcher, scheduler, transport } = setup(hangingCall);
    const spec = createToolSpec(blueprintVisionTool, options);
    const controller = new AbortController();

    const pending = dispatcher.invoke(spec, { image_path: '/data/shaft.png' }, { signal: controller.signal });
    await delay(5);
    expect(transport.calls).toHaveLength(1);
    expect(scheduler.snapshot()[0]?.busy).toBe(true);
    controller.abort();
    const invocation = await pending;

    expect(invocation.outcome).toMatchObject({ status: 'timeout', cancelled: true });
    expect(scheduler.snapshot()[0]).toMatchObject({ busy: false, holders: 0 });
  });

  it('releases GPU residency when cancelled during the swap', async () => {
    const { dispatcher, scheduler, transport } = setup(async () => ({}), new FakeSwapper(hangingSwap));
    const spec = createToolSpec(blueprintVisionTool, options);
    const controller = new AbortController();

    const pending = dispatcher.invoke(spec, { image_path: '/data/shaft.png' }, { signal: controller.signal });
    await delay(5);
    controller.abort();
    const invocation = await pending;

    expect(invocation.outcome).toEqual({
      status: 'timeout',
      error: ErrorCode.TOOL_TIMEOUT,
      reason: 'cancelled',
      cancelled: true,
    });
    expect(transport.calls).toHaveLength(0);
    expect(scheduler.snapshot()[0]).toMatchObject({ busy: false, holders: 0, resident: [] });
  });

  it('wraps non-object responses', async () => {
    const { dispatcher } = setup(async () => ['a', 'b']);
    const spec = createToolSpec(createWebSearchTool('https://search.test/search', 'test-secret'), options);

    const invocation = await dispatcher.invoke(spec, { query: 'PA6' });

    expect(invocation.outcome).toMatchObject({ status: 'success', result: { raw: ['a', 'b'] } });
  });
});

describe('outcome helpers', () => {
  it('describes failures for tool_done and persists them as error payloads', () => {
    const outcome = {
      status: 'rejected',
      error: ErrorCode.SWAP_TIMEOUT,
      reason: 'Loading test-vlm on slot gpu0 exceeded 90s',
    } as const;

    expect(describeOutcome(outcome)).toBe('Rejected: Loading test-vlm on slot gpu0 exceeded 90s');
    expect(outcomeResult(outcome)).toEqual({
      error: 'swap_timeout',
      detail: 'Loading test-vlm on slot gpu0 exceeded 90s',
    });
  });
});
