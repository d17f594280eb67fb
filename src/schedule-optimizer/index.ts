import { Duration, Effect } from "effect";
import { intervalEnd, priceHours, type PriceInterval, type PriceSeries } from "../price-series/types.js";
import { WindowEmptyError, type ChargeConstraints, type Funding, type Schedule } from "./types.js";

const lengthOf = (interval: PriceInterval): number => Duration.toMillis(interval.duration);

const countBlocks = (chosen: ReadonlyArray<boolean>): number =>
  chosen.reduce((count, isChosen, index) => (isChosen && !chosen[index - 1] ? count + 1 : count), 0);

/**
 * Finds the intervals that turn `seed` into a block of at least `minLength`,
 * counting already chosen neighbours. Grows towards the cheaper unchosen
 * neighbour, the earlier one on ties. Returns null when the window runs out.
 */
const growBlock = (
  window: ReadonlyArray<PriceInterval>,
  chosen: ReadonlyArray<boolean>,
  seed: number,
  minLength: number,
): number[] | null => {
  const added = [seed];
  let left = seed;
  let right = seed;
  let length = lengthOf(window[seed]);

  const absorbChosenNeighbours = () => {
    while (left > 0 && chosen[left - 1]) {
      left--;
      length += lengthOf(window[left]);
    }
    while (right < window.length - 1 && chosen[right + 1]) {
      right++;
      length += lengthOf(window[right]);
    }
  };

  absorbChosenNeighbours();

  while (length < minLength) {
    const canGrowLeft = left > 0;
    const canGrowRight = right < window.length - 1;

    if (!canGrowLeft && !canGrowRight) {
      return null;
    }

    const growLeft = canGrowLeft
      && (!canGrowRight || window[left - 1].price <= window[right + 1].price);

    if (growLeft) {
      left--;
      added.push(left);
      length += lengthOf(window[left]);
    } else {
      right++;
      added.push(right);
      length += lengthOf(window[right]);
    }

    absorbChosenNeighbours();
  }

  return added;
};

/**
 * Greedy cheapest-first selection of charging intervals inside
 * [earliestStart, deadline].
 *
 * Without block or session limits this is optimal. With them it is a
 * heuristic: a candidate is skipped when it would open more sessions than
 * allowed, or when no block of the minimum length can be grown around it, and
 * is tried again once later picks have changed the selection.
 * If the window cannot cover the requirement, everything selectable is
 * returned and the schedule is marked underfunded.
 */
export const selectSchedule = (
  series: PriceSeries,
  constraints: ChargeConstraints,
): Effect.Effect<Schedule, WindowEmptyError> =>
  Effect.gen(function* () {
    const earliest = constraints.earliestStart.getTime();
    const deadline = constraints.deadline.getTime();

    // Contiguous, because the series is.
    const window = series.intervals.filter(
      (interval) => interval.start.getTime() >= earliest && intervalEnd(interval).getTime() <= deadline,
    );

    if (window.length === 0) {
      return yield* new WindowEmptyError({
        earliestStart: constraints.earliestStart,
        deadline: constraints.deadline,
      });
    }

    const required = Duration.toMillis(constraints.requiredDuration);
    const minBlock = constraints.minContiguousBlock ? Duration.toMillis(constraints.minContiguousBlock) : 0;
    const maxSessions = constraints.maxSessions ?? Number.POSITIVE_INFINITY;

    const candidates = window
      .map((_, index) => index)
      .sort((a, b) => window[a].price - window[b].price || a - b);

    const chosen = window.map(() => false);
    let accumulated = 0;

    // Accepting a candidate can make an earlier skipped one acceptable (it now
    // extends a session instead of opening one), so skipped candidates get
    // another pass, in the same order, until a pass accepts nothing.
    let pending = candidates;
    while (pending.length > 0 && accumulated < required) {
      const skipped: number[] = [];
      let acceptedAny = false;

      for (const candidate of pending) {
        if (accumulated >= required) {
          break;
        }
        if (chosen[candidate]) {
          continue;
        }

        const additions = minBlock > 0 ? growBlock(window, chosen, candidate, minBlock) : [candidate];
        if (additions === null) {
          skipped.push(candidate);
          continue;
        }

        const tentative = [...chosen];
        for (const index of additions) {
          tentative[index] = true;
        }
        if (countBlocks(tentative) > maxSessions) {
          skipped.push(candidate);
          continue;
        }

        for (const index of additions) {
          chosen[index] = true;
          accumulated += lengthOf(window[index]);
        }
        acceptedAny = true;
      }

      if (!acceptedAny) {
        break;
      }
      pending = skipped;
    }

    const intervals = window.filter((_, index) => chosen[index]);

    const funding: Funding = accumulated >= required
      ? { _tag: "FullyFunded" }
      : { _tag: "Underfunded", shortfall: Duration.millis(required - accumulated) };

    return {
      intervals,
      requiredDuration: constraints.requiredDuration,
      totalDuration: Duration.millis(accumulated),
      totalCost: priceHours(intervals),
      funding,
      chargingPowerKw: constraints.chargingPowerKw,
    };
  });
