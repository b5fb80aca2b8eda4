// Action journal: a LIFO of reversible user actions for the current session.
// Entries hold deep snapshots taken at record time. A popped entry is consumed and
// never pushed back, whether or not its reversal succeeds.

import { cloneMessage, type Message } from './types.js'

export type UndoableAction =
  | {
      kind: 'delete'
      message: Message
      /** Label the message was viewed under when deleted. */
      labelId: string
      /** Row in the visible list at record time, -1 when not listed. Reported when undo fails. */
      originalIndex: number
    }
  | {
      kind: 'archive'
      message: Message
      originalIndex: number
    }

export type ActionKind = UndoableAction['kind']

export function describeAction(action: UndoableAction): ActionKind {
  return action.kind
}

function snapshot(action: UndoableAction): UndoableAction {
  return { ...action, message: cloneMessage(action.message) }
}

export class ActionJournal {
  private stack: UndoableAction[] = []

  record(action: UndoableAction): void {
    this.stack.push(snapshot(action))
  }

  /** Pop the most recent action, or undefined when there is nothing to undo. */
  undoLast(): UndoableAction | undefined {
    return this.stack.pop()
  }

  get canUndo(): boolean {
    return this.stack.length > 0
  }

  get size(): number {
    return this.stack.length
  }

  clear(): void {
    this.stack = []
  }
}
