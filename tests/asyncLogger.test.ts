import { describeError, enqueueLog } from '../src/asyncLogger';
import { loggingQueue } from '../src/queues';
import logger from '../src/logger';

describe('asyncLogger and loggingQueue drain', () => {
  test('enqueueLog schedules a log and drain waits for it', async () => {
    const spy = jest.spyOn(logger, 'log').mockImplementation(() => logger);

    enqueueLog('info', 'test-message-1');
    enqueueLog('warn', 'test-message-2');
    expect(spy).not.toHaveBeenCalled();

    await loggingQueue.drain();

    expect(spy).toHaveBeenCalledWith({ level: 'info', message: 'test-message-1' });
    expect(spy).toHaveBeenCalledWith({ level: 'warn', message: 'test-message-2' });

    spy.mockRestore();
  });

  test('describeError', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError(42)).toBe('42');
  });
});
