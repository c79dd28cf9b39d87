/**
 * RECONCILER
 *
 * Decides per observation whether the store needs an insert, a value
 * update (revision) or nothing. Each observation is judged on its own key;
 * evaluation order inside a batch does not change the outcome.
 */

import { StoreWriteFailure } from '../../../common/errors.js';
import type {
  ApplyOutcome,
  ExistingLookup,
  Observation,
  ReconciliationDecision,
} from '../contracts/market-data.contracts.js';
import type { StoreGateway } from '../storage/store.gateway.js';

export async function reconcile(
  observation: Observation,
  lookup: ExistingLookup
): Promise<ReconciliationDecision> {
  const existing = await lookup(observation.seriesType, observation.date);

  if (!existing) {
    return { kind: 'INSERT', observation };
  }

  // Sources publish fixed-precision figures: any difference is a revision.
  if (existing.value !== observation.value) {
    return { kind: 'UPDATE_VALUE', id: existing.id, observation, previousValue: existing.value };
  }

  return { kind: 'NOOP', observation, reason: 'unchanged' };
}

/**
 * Apply a decision through the gateway. An update replaces value, range
 * and raw payload together.
 */
export async function applyDecision(
  decision: ReconciliationDecision,
  gateway: Pick<StoreGateway, 'insert' | 'updateValue'>
): Promise<ApplyOutcome> {
  const { observation } = decision;

  try {
    switch (decision.kind) {
      case 'INSERT':
        await gateway.insert({
          seriesType: observation.seriesType,
          date: observation.date,
          value: observation.value,
          high: observation.high,
          low: observation.low,
          rawPayload: observation.rawPayload,
        });
        return 'inserted';

      case 'UPDATE_VALUE':
        await gateway.updateValue(decision.id, {
          value: observation.value,
          high: observation.high,
          low: observation.low,
          rawPayload: observation.rawPayload,
        });
        return 'updated';

      case 'NOOP':
        return 'unchanged';
    }
  } catch (err) {
    throw new StoreWriteFailure(observation.seriesType, observation.date, { cause: err });
  }
}

/**
 * Lookup bound to a gateway, with failures surfaced as StoreWriteFailure.
 */
export function gatewayLookup(gateway: Pick<StoreGateway, 'findByKey'>): ExistingLookup {
  return async (seriesType, date) => {
    try {
      return await gateway.findByKey(seriesType, date);
    } catch (err) {
      throw new StoreWriteFailure(seriesType, date, { cause: err });
    }
  };
}
