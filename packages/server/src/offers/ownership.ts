// @module: server-offers-ownership
// @tags: offers, catalog, validation

import type { DependencyOrchestrator, ValidationVerdict } from '../dependencies/orchestrator.js';
import type { ActorRole } from './lifecycle.js';

export type OwnershipError =
  | { code: 'items_not_found'; itemIds: number[] }
  | { code: 'items_inactive'; itemIds: number[] }
  | { code: 'wrong_owner'; role: ActorRole; itemIds: number[] }
  | { code: 'dependency_unavailable'; dependency: 'catalog' };

export type OwnershipResult = { ok: true } | { ok: false; error: OwnershipError };

export interface OwnershipCheck {
  offeredItemIds: number[];
  requestedItemIds: number[];
  proposerId: string;
  receiverId: string;
}

export interface ItemOwnershipValidator {
  validateOwnership(check: OwnershipCheck): Promise<OwnershipResult>;
}

const idsOf = (verdicts: readonly ValidationVerdict[]): number[] =>
  verdicts.map((verdict) => verdict.itemId);

/**
 * One catalog round trip, then the checks in fixed order. Each failure
 * carries every offending id of the first category that failed.
 */
export const createItemOwnershipValidator = (
  dependencies: Pick<DependencyOrchestrator, 'validateItems'>,
): ItemOwnershipValidator => ({
  async validateOwnership({ offeredItemIds, requestedItemIds, proposerId, receiverId }) {
    const outcome = await dependencies.validateItems([...offeredItemIds, ...requestedItemIds]);
    if (!outcome.ok) {
      return { ok: false, error: { code: 'dependency_unavailable', dependency: 'catalog' } };
    }

    const verdicts = outcome.value;

    const missing = verdicts.filter((verdict) => !verdict.exists);
    if (missing.length > 0) {
      return { ok: false, error: { code: 'items_not_found', itemIds: idsOf(missing) } };
    }

    const inactive = verdicts.filter((verdict) => !verdict.isActive);
    if (inactive.length > 0) {
      return { ok: false, error: { code: 'items_inactive', itemIds: idsOf(inactive) } };
    }

    const offered = new Set(offeredItemIds);
    const requested = new Set(requestedItemIds);

    const notProposers = verdicts.filter(
      (verdict) => offered.has(verdict.itemId) && verdict.ownerId !== proposerId,
    );
    if (notProposers.length > 0) {
      return {
        ok: false,
        error: { code: 'wrong_owner', role: 'proposer', itemIds: idsOf(notProposers) },
      };
    }

    const notReceivers = verdicts.filter(
      (verdict) => requested.has(verdict.itemId) && verdict.ownerId !== receiverId,
    );
    if (notReceivers.length > 0) {
      return {
        ok: false,
        error: { code: 'wrong_owner', role: 'receiver', itemIds: idsOf(notReceivers) },
      };
    }

    return { ok: true };
  },
});
