import { ConsoleLogger } from '../../core/logger';
import { ReprocessScheduler } from '../../core/reprocess-scheduler';

describe('ReprocessScheduler', () => {
  let pass: jest.Mock<void, []>;
  let scheduler: ReprocessScheduler;

  beforeEach(() => {
    jest.useFakeTimers();
    pass = jest.fn<void, []>();
    scheduler = new ReprocessScheduler(pass, new ConsoleLogger('ERROR'));
  });

  afterEach(() => {
    scheduler.cancel();
    jest.useRealTimers();
  });

  it('should run once after edits go quiet', () => {
    scheduler.schedule();
    jest.advanceTimersByTime(500);
    scheduler.schedule();
    scheduler.schedule();

    jest.advanceTimersByTime(999);
    expect(pass).not.toHaveBeenCalled();
    expect(scheduler.isPending()).toBe(true);

    jest.advanceTimersByTime(1);
    expect(pass).toHaveBeenCalledTimes(1);
    expect(scheduler.isPending()).toBe(false);
  });

  it('should run immediately when flushed', () => {
    scheduler.schedule();

    scheduler.flush();
    jest.advanceTimersByTime(2000);

    expect(pass).toHaveBeenCalledTimes(1);
  });

  it('should do nothing when flushed without edits', () => {
    scheduler.flush();

    expect(pass).not.toHaveBeenCalled();
  });

  it('should drop pending edits when cancelled', () => {
    scheduler.schedule();

    scheduler.cancel();
    jest.advanceTimersByTime(2000);

    expect(pass).not.toHaveBeenCalled();
    expect(scheduler.isPending()).toBe(false);
  });

  it('should honour a custom idle delay', () => {
    const quick = new ReprocessScheduler(pass, new ConsoleLogger('ERROR'), 10);

    quick.schedule();
    jest.advanceTimersByTime(10);

    expect(pass).toHaveBeenCalledTimes(1);
  });
});
