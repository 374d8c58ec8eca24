/**
 * Tests for the dispatch loop, start-up and shutdown
 */
import { EchoService } from '../components/EchoService';
import { Dispatcher } from '../services/Dispatcher';
import { ErrorHandler } from '../services/ErrorHandler';
import { CallLog, FakeInput, FakeOutput, FakeService, RecordingNotifier, recordedFailures, tokens } from './setup';

describe('Dispatcher run loop', () => {
  let log: CallLog;
  let errorHandler: ErrorHandler;

  beforeEach(() => {
    log = [];
    errorHandler = new ErrorHandler();
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function build(inputs: FakeInput[], outputs: FakeOutput[], services: FakeService[] | EchoService[], pollIntervalMs = 1) {
    return new Dispatcher({
      notifier: new RecordingNotifier(),
      keyPhrases: ['Hey Computer'],
      inputs,
      outputs,
      services,
      pollIntervalMs,
      errorHandler
    });
  }

  test('reads, handles and responds until stopped', async () => {
    const input = new FakeInput('in', [tokens('hey computer say hi'), null, tokens('nothing here')], log);
    const output = new FakeOutput('out', log);
    const service = new FakeService('svc', 1.0, { text: 'done' }, [], log);
    const dispatcher = build([input], [output], [service]);
    input.onDrained = () => dispatcher.stop();

    await dispatcher.run();

    expect(output.written).toEqual(['done']);
    expect(service.evaluated).toHaveLength(1);
    expect(log).toEqual(['start:in', 'start:out', 'start:svc', 'stop:in', 'stop:out', 'stop:svc']);
    expect(dispatcher.isRunning()).toBe(false);
  });

  test('batches from each input are answered in sweep order', async () => {
    const first = new FakeInput('first', [tokens('hey computer say one')]);
    const second = new FakeInput('second', [tokens('hey computer say two')]);
    const output = new FakeOutput('out');
    const dispatcher = build([first, second], [output], [new EchoService(null)]);
    second.onDrained = () => dispatcher.stop();

    await dispatcher.run();

    expect(output.written).toEqual(['one', 'two']);
  });

  test('a stop request is honoured between reads', async () => {
    const first = new FakeInput('first', []);
    const second = new FakeInput('second', [tokens('hey computer say two')]);
    const output = new FakeOutput('out');
    const dispatcher = build([first, second], [output], [new EchoService(null)]);
    first.onDrained = () => dispatcher.stop();

    await dispatcher.run();

    expect(output.written).toEqual([]);
  });

  test('stopping wakes a sleeping loop', async () => {
    const input = new FakeInput('in', []);
    const dispatcher = build([input], [], [], 60000);
    dispatcher.once('started', () => {
      setTimeout(() => dispatcher.stop(), 10);
    });

    const startedAt = Date.now();
    await dispatcher.run();

    expect(Date.now() - startedAt).toBeLessThan(5000);
  });

  test('every component is stopped even when one fails to stop', async () => {
    const input = new FakeInput('in', [], log);
    input.failStop = true;
    const output = new FakeOutput('out', log);
    const service = new FakeService('svc', null, {}, [], log);
    const dispatcher = build([input], [output], [service]);
    input.onDrained = () => dispatcher.stop();

    await dispatcher.run();

    expect(log).toEqual(['start:in', 'start:out', 'start:svc', 'stop:in', 'stop:out', 'stop:svc']);
    expect(errorHandler.getFailureCount('component_stop')).toBe(1);
  });

  test('a throwing cycle listener does not end the loop early', async () => {
    const input = new FakeInput('in', [tokens('hey computer say one'), tokens('hey computer say two')], log);
    const output = new FakeOutput('out', log);
    const dispatcher = build([input], [output], [new EchoService(null)]);
    dispatcher.on('cycle_complete', () => {
      throw new Error('dashboard offline');
    });
    input.onDrained = () => dispatcher.stop();

    await dispatcher.run();

    expect(output.written).toEqual(['one', 'two']);
    expect(log).toEqual(['start:in', 'start:out', 'stop:in', 'stop:out']);
  });

  test('shutdown happens exactly once', async () => {
    const input = new FakeInput('in', [], log);
    const dispatcher = build([input], [], []);
    input.onDrained = () => {
      dispatcher.stop();
      dispatcher.interrupt();
    };

    await dispatcher.run();
    dispatcher.stop();

    expect(log.filter(entry => entry === 'stop:in')).toHaveLength(1);
  });

  test('a start-up failure is fatal and stops what already started', async () => {
    const input = new FakeInput('in', [], log);
    const output = new FakeOutput('out', log);
    output.failStart = true;
    const service = new FakeService('svc', null, {}, [], log);
    const dispatcher = build([input], [output], [service]);

    await expect(dispatcher.run()).rejects.toThrow('out cannot start');

    expect(log).toEqual(['start:in', 'start:out', 'stop:in']);
    expect(dispatcher.isRunning()).toBe(false);
  });

  test('a dispatcher only runs once', async () => {
    const input = new FakeInput('in', []);
    const dispatcher = build([input], [], []);
    input.onDrained = () => dispatcher.stop();

    await dispatcher.run();

    await expect(dispatcher.run()).rejects.toThrow('Dispatcher has already been run');
  });

  test('a failing read is recorded and the loop carries on', async () => {
    const input = new FakeInput('in', [tokens('hey computer say again')]);
    input.failRead = true;
    const output = new FakeOutput('out');
    const dispatcher = build([input], [output], [new EchoService(null)]);
    input.onDrained = () => dispatcher.stop();
    const failures = recordedFailures(errorHandler);

    await dispatcher.run();

    expect(output.written).toEqual(['again']);
    expect(failures).toEqual(['input_read']);
    expect(errorHandler.getFailureCount('input_read')).toBe(0);
  });

  test('an empty batch is treated as nothing read', async () => {
    const input = new FakeInput('in', [[]]);
    const service = new FakeService('svc', 1.0, { text: 'x' });
    const dispatcher = build([input], [], [service]);
    input.onDrained = () => dispatcher.stop();

    await dispatcher.run();

    expect(service.evaluated).toHaveLength(0);
    expect(dispatcher.getStats().batches).toBe(0);
  });

  test('an interrupt is logged distinctly and stops the loop', async () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
    const input = new FakeInput('in', []);
    const dispatcher = build([input], [], []);
    input.onDrained = () => dispatcher.interrupt();

    await dispatcher.run();

    expect(warnSpy).toHaveBeenCalledWith('Interrupt received');
    expect(dispatcher.isRunning()).toBe(false);
  });
});
