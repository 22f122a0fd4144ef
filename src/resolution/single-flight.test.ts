/**
 * Tests for SingleFlightCoordinator
 */

import { describe, it, expect, jest } from '@jest/globals';
import { SingleFlightCoordinator } from './single-flight.js';
import { deferred } from '../../tests/helpers/engine.js';

describe('SingleFlightCoordinator', () => {
  it('collapses concurrent runs for one id into a single computation', async () => {
    const gate = deferred();
    const compute = jest.fn(async (channelId: string) => {
      await gate.promise;
      return `analysis of ${channelId}`;
    });
    const coordinator = new SingleFlightCoordinator({ compute });

    const runs = Array.from({ length: 10 }, () => coordinator.run('UCone'));
    expect(coordinator.isInFlight('UCone')).toBe(true);
    expect(coordinator.size).toBe(1);

    gate.resolve();
    const results = await Promise.all(runs);

    expect(compute).toHaveBeenCalledTimes(1);
    expect(new Set(results)).toEqual(new Set(['analysis of UCone']));
    expect(coordinator.isInFlight('UCone')).toBe(false);
  });

  it('delivers the same failure to every joined caller', async () => {
    const gate = deferred();
    const failure = new Error('provider down');
    const compute = jest.fn(async () => {
      await gate.promise;
      throw failure;
    });
    const coordinator = new SingleFlightCoordinator<string>({ compute });

    const runs = [coordinator.run('UCone'), coordinator.run('UCone')].map((run) =>
      run.catch((error: unknown) => error)
    );
    gate.resolve();

    expect(await Promise.all(runs)).toEqual([failure, failure]);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('starts a new computation after the previous one settled', async () => {
    let count = 0;
    const coordinator = new SingleFlightCoordinator({
      compute: async () => {
        count++;
        return count;
      },
    });

    expect(await coordinator.run('UCone')).toBe(1);
    expect(await coordinator.run('UCone')).toBe(2);
  });

  it('runs different ids independently within the concurrency bound', async () => {
    const gate = deferred();
    const started: string[] = [];
    const coordinator = new SingleFlightCoordinator({
      compute: async (channelId: string) => {
        started.push(channelId);
        await gate.promise;
        return channelId;
      },
      maxConcurrent: 2,
    });

    const runs = ['UCa', 'UCb', 'UCc'].map((id) => coordinator.run(id));
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(started).toEqual(['UCa', 'UCb']);
    expect(coordinator.getStats()).toEqual({ inFlight: 3, running: 2, queued: 1, limit: 2 });

    gate.resolve();
    expect(await Promise.all(runs)).toEqual(['UCa', 'UCb', 'UCc']);
    expect(started).toEqual(['UCa', 'UCb', 'UCc']);
  });
});
