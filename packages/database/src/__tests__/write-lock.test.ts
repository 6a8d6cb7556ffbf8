import {describe, expect, it} from 'vitest';
import {withWriteLock} from '../write-lock';

const tick = () => new Promise(resolve => setTimeout(resolve, 0));

describe('withWriteLock', () => {
  it('should run work for one database one at a time', async () => {
    const database = {};
    const events: string[] = [];
    const step = (name: string) => async () => {
      events.push(`${name} start`);
      await tick();
      events.push(`${name} end`);
      return name;
    };

    const results = await Promise.all([
      withWriteLock(database, step('first')),
      withWriteLock(database, step('second')),
    ]);

    expect(results).toEqual(['first', 'second']);
    expect(events).toEqual([
      'first start',
      'first end',
      'second start',
      'second end',
    ]);
  });

  it('should keep going after a failed write', async () => {
    const database = {};

    const failed = withWriteLock(database, async () => {
      throw new Error('SQLITE_CONSTRAINT');
    });
    const next = withWriteLock(database, async () => 'written');

    await expect(failed).rejects.toThrow('SQLITE_CONSTRAINT');
    await expect(next).resolves.toBe('written');
  });

  it('should not hold up work for another database', async () => {
    const events: string[] = [];

    const slow = withWriteLock({}, async () => {
      await tick();
      events.push('slow');
    });
    await withWriteLock({}, async () => {
      events.push('fast');
    });
    await slow;

    expect(events).toEqual(['fast', 'slow']);
  });
});
