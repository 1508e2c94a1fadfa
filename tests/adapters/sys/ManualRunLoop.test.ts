import { ManualRunLoop } from '../../../src/adapters/sys/ManualRunLoop';
import { LoopTimer } from '../../../src/domain/timers/LoopTimer';
import type { SchedulableTimer } from '../../../src/domain/timers/Timer';
import { InvalidArgumentError, TimerError } from '../../../src/domain/timers/TimerErrors';

function oneShot(fireDate: number, callback: () => void = () => undefined) {
  return new LoopTimer({ fireDate, intervalMs: fireDate, repeats: false, callback });
}

describe('ManualRunLoop', () => {
  test('starts at the configured time and never fires on its own', () => {
    const loop = new ManualRunLoop({ startTime: 500 });
    const callback = jest.fn();
    loop.addTimer(oneShot(500, callback), 'default');

    expect(loop.now()).toBe(500);
    expect(callback).not.toHaveBeenCalled();
    expect(loop.pendingCount()).toBe(1);
  });

  test('fires a due timer with the clock set to its fire date', () => {
    const loop = new ManualRunLoop();
    const seen: number[] = [];
    loop.addTimer(oneShot(100, () => seen.push(loop.now())), 'default');

    expect(loop.advanceBy(99)).toBe(0);
    expect(loop.advanceBy(50)).toBe(1);

    expect(seen).toEqual([100]);
    expect(loop.now()).toBe(149);
    expect(loop.pendingCount()).toBe(0);
  });

  test('fires in fire-date order, ties in attachment order', () => {
    const loop = new ManualRunLoop();
    const order: string[] = [];
    loop.addTimer(oneShot(50, () => order.push('a@50')), 'default');
    loop.addTimer(oneShot(30, () => order.push('b@30')), 'default');
    loop.addTimer(oneShot(50, () => order.push('c@50')), 'default');

    loop.advanceTo(100);

    expect(order).toEqual(['b@30', 'a@50', 'c@50']);
  });

  test('a timer attached under two modes fires once per date until removed from both', () => {
    const loop = new ManualRunLoop();
    const callback = jest.fn();
    const timer = new LoopTimer({ fireDate: 10, intervalMs: 10, repeats: true, callback });

    loop.addTimer(timer, 'default');
    loop.addTimer(timer, 'common');
    loop.advanceTo(10);
    expect(callback).toHaveBeenCalledTimes(1);

    loop.removeTimer(timer, 'common');
    expect(loop.containsTimer(timer, 'default')).toBe(true);
    expect(loop.containsTimer(timer, 'common')).toBe(false);
    loop.advanceTo(20);
    expect(callback).toHaveBeenCalledTimes(2);

    loop.removeTimer(timer, 'default');
    loop.advanceTo(100);
    expect(callback).toHaveBeenCalledTimes(2);
    expect(timer.isValid).toBe(true);
  });

  test('ignores invalid timers and removals of unknown timers', () => {
    const loop = new ManualRunLoop();
    const timer = oneShot(10);
    timer.invalidate();

    loop.addTimer(timer, 'default');
    loop.removeTimer(oneShot(20), 'default');

    expect(loop.containsTimer(timer, 'default')).toBe(false);
    expect(loop.nextFireDate()).toBeNull();
  });

  test('drops timers invalidated while attached without firing them', () => {
    const loop = new ManualRunLoop();
    const callback = jest.fn();
    const timer = oneShot(10, callback);
    loop.addTimer(timer, 'default');

    timer.invalidate();

    expect(loop.advanceTo(50)).toBe(0);
    expect(callback).not.toHaveBeenCalled();
    expect(loop.pendingCount()).toBe(0);
  });

  test('timers attached from a callback fire within the same advance when due', () => {
    const loop = new ManualRunLoop();
    const fired: number[] = [];
    loop.addTimer(
      oneShot(100, () => {
        fired.push(loop.now());
        loop.addTimer(oneShot(loop.now() + 50, () => fired.push(loop.now())), 'default');
      }),
      'default'
    );

    expect(loop.advanceTo(200)).toBe(2);
    expect(fired).toEqual([100, 150]);
  });

  test('a callback may advance the clock without its own timer firing again', () => {
    const loop = new ManualRunLoop();
    const seen: string[] = [];
    loop.addTimer(
      oneShot(100, () => {
        seen.push(`a@${loop.now()}`);
        loop.advanceBy(50);
      }),
      'default'
    );
    loop.addTimer(oneShot(140, () => seen.push(`b@${loop.now()}`)), 'default');

    expect(loop.advanceTo(120)).toBe(1);
    expect(seen).toEqual(['a@100', 'b@140']);
    expect(loop.now()).toBe(150);
    expect(loop.pendingCount()).toBe(0);
  });

  test('a repeating timer is not re-delivered while its callback runs', () => {
    const loop = new ManualRunLoop();
    const fired: number[] = [];
    const timer = new LoopTimer({
      fireDate: 100,
      intervalMs: 100,
      repeats: true,
      callback: () => {
        fired.push(loop.now());
        if (fired.length === 1) loop.advanceBy(250);
      },
    });
    loop.addTimer(timer, 'default');

    expect(loop.advanceTo(100)).toBe(1);
    expect(fired).toEqual([100]);
    expect(timer.fireCount).toBe(1);
    expect(timer.fireDate).toBe(200);
    expect(loop.now()).toBe(350);
  });

  test('runUntilIdle from a callback skips the timer that is firing', () => {
    const loop = new ManualRunLoop();
    const seen: number[] = [];
    loop.addTimer(
      oneShot(100, () => {
        seen.push(loop.runUntilIdle());
      }),
      'default'
    );
    loop.addTimer(oneShot(300), 'default');

    expect(loop.advanceTo(100)).toBe(1);
    expect(seen).toEqual([1]);
    expect(loop.now()).toBe(300);
    expect(loop.pendingCount()).toBe(0);
  });

  test('refuses to move the clock backwards', () => {
    const loop = new ManualRunLoop({ startTime: 100 });
    expect(() => loop.advanceTo(50)).toThrow('Cannot move the clock from 100 to 50.');
    expect(() => loop.advanceBy(-1)).toThrow(InvalidArgumentError);
    expect(() => new ManualRunLoop({ startTime: Number.NaN })).toThrow(InvalidArgumentError);
  });

  test('propagates callback errors and still detaches a finished one-shot', () => {
    const loop = new ManualRunLoop();
    loop.addTimer(
      oneShot(10, () => {
        throw new Error('boom');
      }),
      'default'
    );

    expect(() => loop.advanceBy(10)).toThrow('boom');
    expect(loop.pendingCount()).toBe(0);
  });

  test('runUntilIdle drains one-shot timers', () => {
    const loop = new ManualRunLoop();
    loop.addTimer(oneShot(300), 'default');
    loop.addTimer(oneShot(100), 'default');

    expect(loop.runUntilIdle()).toBe(2);
    expect(loop.now()).toBe(300);
  });

  test('runUntilIdle gives up on repeating timers', () => {
    const loop = new ManualRunLoop();
    loop.addTimer(new LoopTimer({ fireDate: 100, intervalMs: 100, repeats: true, callback: jest.fn() }), 'default');

    expect(() => loop.runUntilIdle(5)).toThrow(TimerError);
    expect(loop.now()).toBe(500);
  });

  test('reports timers whose fire date does not move forward', () => {
    const loop = new ManualRunLoop();
    const stuck: SchedulableTimer = {
      id: 'stuck',
      fireDate: 0,
      isValid: true,
      fire: jest.fn(),
    };
    loop.addTimer(stuck, 'default');

    expect(() => loop.advanceTo(10)).toThrow('Timer stuck did not advance past 0.');
  });
});
