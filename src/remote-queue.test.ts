import { expect, test } from 'vitest'
import { ApiError } from './api-utils.js'
import { RemoteQueue } from './remote-queue.js'
import { recordingLogger } from './test-helpers.js'

function deferred() {
  let resolve = () => {}
  const promise = new Promise<void>((r) => {
    resolve = () => r()
  })
  return { promise, resolve }
}

test('runs tasks for the same id in submission order', async () => {
  const queue = new RemoteQueue({ logger: recordingLogger() })
  const order: string[] = []
  const gate = deferred()

  queue.submit('m1', 'trash', async () => {
    await gate.promise
    order.push('trash')
  })
  queue.submit('m1', 'untrash', async () => {
    order.push('untrash')
  })

  gate.resolve()
  await queue.drain()
  expect(order).toEqual(['trash', 'untrash'])
  expect(queue.pending).toBe(0)
})

test('does not hold other ids behind a slow task', async () => {
  const queue = new RemoteQueue({ logger: recordingLogger() })
  const order: string[] = []
  const gate = deferred()

  queue.submit('m1', 'trash', async () => {
    await gate.promise
    order.push('m1')
  })
  queue.submit('m2', 'trash', async () => {
    order.push('m2')
  })

  await new Promise((r) => setTimeout(r, 0))
  expect(order).toEqual(['m2'])
  gate.resolve()
  await queue.drain()
  expect(order).toEqual(['m2', 'm1'])
})

test('logs returned errors and thrown errors, and keeps going', async () => {
  const logger = recordingLogger()
  const queue = new RemoteQueue({ logger })
  const order: string[] = []

  queue.submit('m1', 'archive', async () => new ApiError({ reason: 'boom' }))
  queue.submit('m1', 'unarchive', async () => {
    throw new Error('socket hang up')
  })
  queue.submit('m1', 'markRead', async () => {
    order.push('markRead')
  })

  await queue.drain()
  expect(order).toEqual(['markRead'])
  expect(logger.lines.filter((l) => l.startsWith('error'))).toEqual([
    `error Remote archive failed: ${new ApiError({ reason: 'boom' }).message}`,
    'error Remote unarchive threw: socket hang up',
  ])
})
