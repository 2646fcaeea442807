import { ScoredSender, UserIntent, PlannedAction } from '../types/sender';

/**
 * Chooses the cleanup action for a sender the user selected.
 *
 * Unsubscribing is only planned for one-click senders whose target is an
 * HTTP(S) URL. A mailto target is never dispatched, whatever the intent.
 */
export function planAction(sender: ScoredSender, intent: UserIntent): PlannedAction {
  switch (intent) {
    case 'skip':
      return { type: 'skip' };
    case 'delete_only':
      return { type: 'delete_only' };
    case 'block_only':
      return { type: 'block_then_delete' };
    case 'unsubscribe_if_possible': {
      const target = sender.unsubscribeTarget;
      if (sender.oneClickEligible && target?.kind === 'http') {
        return { type: 'unsubscribe_then_delete', target };
      }
      return { type: 'block_then_delete' };
    }
  }
}
