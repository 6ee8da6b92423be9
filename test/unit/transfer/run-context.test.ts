import assert from 'assert';
import { EventEmitter } from 'events';
import { RunContext } from '../../../src/transfer/run-context.ts';
import { createRecordingLogger } from '../../lib/logger.ts';

describe('RunContext', () => {
  it('falls back to 240 seconds for a missing or non-positive budget', () => {
    assert.strictEqual(new RunContext().maxExecutionTime, 240);
    assert.strictEqual(new RunContext({ maxExecutionTime: 0 }).maxExecutionTime, 240);
    assert.strictEqual(new RunContext({ maxExecutionTime: -5 }).maxExecutionTime, 240);
    assert.strictEqual(new RunContext({ maxExecutionTime: 30 }).maxExecutionTime, 30);
  });

  it('measures elapsed time from construction', () => {
    let now = 1_000;
    const context = new RunContext({ now: () => now });
    now = 3_500;
    assert.strictEqual(context.elapsedSeconds(), 2.5);
    assert.strictEqual(context.currentTime().getTime(), 3_500);
  });

  it('stops once the budget is reached and stays stopped', () => {
    let now = 0;
    const logger = createRecordingLogger();
    const context = new RunContext({ maxExecutionTime: 5, now: () => now, logger });

    now = 4_999;
    assert.strictEqual(context.shouldStop(), false);
    now = 5_000;
    assert.strictEqual(context.shouldStop(), true);
    now = 0;
    assert.strictEqual(context.shouldStop(), true);
    assert.strictEqual(context.stopReason, 'time-limit');
    assert.deepStrictEqual(logger.messages('warn'), ['Approaching time limit (5.0s/5s), will exit after current row']);
  });

  it('stops after cancel', () => {
    const context = new RunContext();
    context.cancel();
    assert.strictEqual(context.shouldStop(), true);
    assert.strictEqual(context.stopReason, 'cancelled');
  });

  it('stops when its abort signal fires', () => {
    const controller = new AbortController();
    const context = new RunContext({ signal: controller.signal });
    assert.strictEqual(context.shouldStop(), false);
    controller.abort();
    assert.strictEqual(context.shouldStop(), true);
  });

  it('turns termination signals into a stop and removes its handlers on dispose', () => {
    const target = new EventEmitter();
    const logger = createRecordingLogger();
    const context = new RunContext({ logger });

    const dispose = context.installSignalHandlers(target);
    assert.strictEqual(target.listenerCount('SIGTERM'), 1);
    assert.strictEqual(target.listenerCount('SIGINT'), 1);

    target.emit('SIGTERM', 'SIGTERM');
    assert.strictEqual(context.stopReason, 'cancelled');
    assert.deepStrictEqual(logger.messages('info'), ['Stop requested, will exit after completing current row']);

    dispose();
    assert.strictEqual(target.listenerCount('SIGTERM'), 0);
    assert.strictEqual(target.listenerCount('SIGINT'), 0);
  });
});
