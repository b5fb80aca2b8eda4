import { expect, test } from 'vitest'
import { makeMessage } from './test-helpers.js'
import { ActionJournal, describeAction } from './undo.js'

test('pops actions in reverse order of recording', () => {
  const journal = new ActionJournal()
  journal.record({ kind: 'delete', message: makeMessage('a'), labelId: 'INBOX', originalIndex: 0 })
  journal.record({ kind: 'archive', message: makeMessage('b'), originalIndex: 2 })

  expect(journal.size).toBe(2)
  expect(journal.undoLast()?.message.id).toBe('b')
  expect(journal.undoLast()?.message.id).toBe('a')
  expect(journal.undoLast()).toBeUndefined()
  expect(journal.canUndo).toBe(false)
})

test('keeps a snapshot that later edits to the message do not reach', () => {
  const journal = new ActionJournal()
  const message = makeMessage('a', { labelIds: ['INBOX', 'WORK'] })
  journal.record({ kind: 'archive', message, originalIndex: 0 })

  message.labelIds.pop()
  message.subject = 'changed'

  const entry = journal.undoLast()
  expect(entry?.message.labelIds).toEqual(['INBOX', 'WORK'])
  expect(entry?.message.subject).toBe('Subject a')
})

test('describeAction names the action kind', () => {
  expect(describeAction({ kind: 'delete', message: makeMessage('a'), labelId: 'INBOX', originalIndex: 0 })).toBe('delete')
  expect(describeAction({ kind: 'archive', message: makeMessage('a'), originalIndex: 0 })).toBe('archive')
})
