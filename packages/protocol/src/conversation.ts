/**
 * Conversation Driver
 *
 * Runs one present-proof conversation:
 * - Validates an external trigger against the current state
 * - Repeatedly executes the current state, validates the proposed
 *   transition, commits the step's action and advances, until `noop`
 * - Routes every failure into the abandon path (`internal`, or `rejected`
 *   for user cancellation) so that the conversation always ends in `done`
 *
 * Calls on one conversation are serialized; separate conversations share
 * nothing and may run concurrently.
 */

import { InvalidTransitionError, abandonCodeFor, describeError } from './errors.js';
import { executeState } from './executor.js';
import { noopLogger, type Logger } from './logger.js';
import type { ConversationMetadata } from './metadata.js';
import type { Messenger } from './messenger.js';
import { State, canTransitionTo, stateName, type ProtocolState, type StateName } from './states.js';

export interface ConversationOptions {
  messenger: Messenger;
  logger?: Logger;
  /** Label used in log lines, typically the thread id */
  label?: string;
  initial?: ProtocolState;
}

export interface Conversation {
  /** Last state entered (never `noop`) */
  getState(): ProtocolState;

  /** Names of all states entered so far, oldest first */
  getHistory(): readonly StateName[];

  /**
   * Move to `trigger` and run until there is nothing left to do.
   * Throws InvalidTransitionError, leaving the conversation untouched, if
   * the current state does not allow `trigger`. A `md.err` supplied by the
   * caller abandons the conversation right after entering `trigger`.
   */
  advance(trigger: ProtocolState, md: ConversationMetadata): Promise<ProtocolState>;

  /**
   * Abandon the conversation because of `err`; a UserCancellationError is
   * reported to the peer as `rejected`, anything else as `internal`.
   */
  abort(err: unknown, md: ConversationMetadata): Promise<ProtocolState>;
}

export function createConversation(opts: ConversationOptions): Conversation {
  const { messenger } = opts;
  const logger = opts.logger ?? noopLogger;
  const label = opts.label ?? 'conversation';

  let current: ProtocolState = opts.initial ?? State.start();
  const history: StateName[] = [current.name];

  // Tail of the per-conversation call queue
  let tail: Promise<unknown> = Promise.resolve();

  function serialize<T>(task: () => Promise<T>): Promise<T> {
    const result = tail.then(task);
    // The caller observes the failure through `result`; the queue moves on.
    tail = result.catch(() => undefined);
    return result;
  }

  function enter(state: ProtocolState) {
    logger.debug(`${label}: ${current.name} -> ${state.name}`);
    current = state;
    history.push(stateName(state));
  }

  function requireTransition(next: ProtocolState) {
    if (!canTransitionTo(current, next)) {
      throw new InvalidTransitionError(stateName(current), stateName(next));
    }
  }

  function abandonFor(err: unknown, md: ConversationMetadata): ConversationMetadata {
    const state = State.abandoning(abandonCodeFor(err));
    logger.warn(`${label}: abandoning from ${current.name}`, {
      code: abandonCodeFor(err),
      reason: describeError(err),
    });
    enter(state);
    return { ...md, err };
  }

  async function run(first: ProtocolState, initialMd: ConversationMetadata): Promise<ProtocolState> {
    let md = initialMd;
    let state = first;
    enter(state);

    if (md.err !== undefined && state.name !== 'abandoning') {
      md = abandonFor(md.err, md);
      state = current;
    }

    while (state.name !== 'noop') {
      try {
        const { next, action } = await executeState(state, md);

        // Assertion: executors only propose successors from the table
        if (next.name !== 'noop' && !canTransitionTo(state, next)) {
          throw new InvalidTransitionError(stateName(state), stateName(next));
        }

        await action(messenger);

        state = next;
        if (state.name !== 'noop') {
          enter(state);
        }
      } catch (err) {
        // Failing to abandon cleanly is a hard failure
        if (state.name === 'abandoning') {
          logger.error(`${label}: abandon failed`, { reason: describeError(err) });
          throw err;
        }

        md = abandonFor(err, md);
        state = current;
      }
    }

    return current;
  }

  return {
    getState: () => current,
    getHistory: () => [...history],

    advance(trigger, md) {
      return serialize(async () => {
        requireTransition(trigger);
        return run(trigger, md);
      });
    },

    abort(err, md) {
      return serialize(async () => {
        const state = State.abandoning(abandonCodeFor(err));
        requireTransition(state);
        return run(state, { ...md, err });
      });
    },
  };
}
