/**
 * Orchestrator — stage state machine for the ordering workflow
 *
 * product_request → request_details → address_purpose → completed
 *
 * Transitions are checked against session state by a pure function; the
 * runtime applies them and runs the one-time expansion of the new stage.
 */

import { AGENT_IDS, type AgentId, type Session } from '../memory';
import { FIELD_METADATA, isFilled, requiredFieldsFor } from '../agents/fields';

export type TransitionResult =
  | { ok: true; from: AgentId; to: AgentId }
  | { ok: false; from: AgentId; to: AgentId; reason: string };

export type AddressPurposePhase =
  | 'idle'
  | 'data_fetched'
  | 'industry_selected'
  | 'address_selected'
  | 'confirmation_shown'
  | 'order_placed'
  | 'order_failed';

export const UNKNOWN_AGENT_MESSAGE = 'Unknown agent state. Restarting session...';
export const COMPLETED_MESSAGE =
  'Your order has already been placed. Please start a new session to place another order.';
export const ORDER_LOCKED_MESSAGE =
  'This order has already been placed and can no longer be changed. Please start a new session to place another order.';

export function isAgentId(value: string): value is AgentId {
  return AGENT_IDS.some((id) => id === value);
}

export function pendingRequiredFields(session: Session): string[] {
  return requiredFieldsFor(session.request).filter((field) => !isFilled(session.fields[field]));
}

/**
 * Check a requested hand-off against the current session
 */
export function transition(session: Session, to: AgentId): TransitionResult {
  const from = session.agent;
  const reject = (reason: string): TransitionResult => ({ ok: false, from, to, reason });

  switch (`${from}->${to}`) {
    case 'product_request->request_details':
      if (!session.product?._id) return reject('product record with _id required');
      if (!session.request) return reject('request type required');
      return { ok: true, from, to };

    case 'request_details->address_purpose': {
      const pending = pendingRequiredFields(session);
      if (pending.length > 0) return reject(`pending fields: ${pending.join(', ')}`);
      return { ok: true, from, to };
    }

    case 'address_purpose->completed':
      if (session.order?.status !== 'placed') return reject('order not placed');
      return { ok: true, from, to };

    default:
      return reject('no such transition');
  }
}

/**
 * One-time initialisation of the stage being entered
 */
export function expandSession(session: Session, entering: AgentId): void {
  switch (entering) {
    case 'request_details':
      for (const field of requiredFieldsFor(session.request)) {
        if (session.fields[field] === undefined) {
          session.fields[field] = '';
        }
        session.validationInfo[field] = { ...FIELD_METADATA[field], required: true };
      }
      break;

    case 'address_purpose':
      session.address = null;
      session.industryId = null;
      session.industryName = null;
      session.confirmationShown = false;
      break;

    case 'product_request':
    case 'completed':
      break;
  }
}

export function addressPurposePhase(session: Session): AddressPurposePhase {
  if (session.order?.status === 'placed') return 'order_placed';
  if (session.order?.status === 'failed') return 'order_failed';
  if (!session.cachedDataFetched) return 'idle';
  if (session.confirmationShown) return 'confirmation_shown';
  if (session.industryId && session.address) return 'address_selected';
  if (session.industryId) return 'industry_selected';
  return 'data_fetched';
}
