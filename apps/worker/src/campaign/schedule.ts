import {
  concatMap,
  defer,
  from,
  lastValueFrom,
  map,
  mergeMap,
  Observable,
  timer,
  toArray,
} from 'rxjs';
import { PipelineConfig } from '../config/pipeline.config';

/**
 * How many items run at once, and how long to pause before starting each
 * item after the first. Sequential mode is simply a plan with one worker.
 */
export interface SchedulePlan {
  concurrency: number;
  delayBetweenMs: number;
}

export function schedulePlan(
  config: Pick<
    PipelineConfig,
    'schedulingMode' | 'concurrency' | 'interEpisodeDelayMs'
  >,
): SchedulePlan {
  return config.schedulingMode === 'sequential'
    ? { concurrency: 1, delayBetweenMs: config.interEpisodeDelayMs }
    : { concurrency: config.concurrency, delayBetweenMs: 0 };
}

/**
 * Feeds `items` through `worker` with at most `plan.concurrency` in flight.
 *
 * The source is a queue of descriptors drained by mergeMap: items beyond the
 * concurrency limit wait in mergeMap's buffer until a worker slot frees up.
 * Results come back in input order. `worker` is expected to handle its own
 * errors; a rejection aborts the whole run.
 */
export function runBounded<T, R>(
  items: readonly T[],
  plan: SchedulePlan,
  worker: (item: T) => Promise<R>,
): Promise<R[]> {
  const jobs$ = from(items.map((item, position) => ({ item, position })));

  const results$: Observable<R[]> = jobs$.pipe(
    mergeMap(({ item, position }) => {
      const run$ = defer(() => worker(item)).pipe(
        map((result) => ({ position, result })),
      );
      return position > 0 && plan.delayBetweenMs > 0
        ? timer(plan.delayBetweenMs).pipe(concatMap(() => run$))
        : run$;
    }, plan.concurrency),
    toArray(),
    map((settled) =>
      settled
        .sort((a, b) => a.position - b.position)
        .map((entry) => entry.result),
    ),
  );

  return lastValueFrom(results$);
}
