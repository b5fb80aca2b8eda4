// Fire-and-forget dispatch of remote mutations triggered by user actions.
// Tasks for the same message id run in submission order (trash before untrash);
// tasks for different ids run concurrently. Failures are logged, never returned.

import type { Logger } from './logger.js'

export type RemoteTask = () => Promise<void | Error>

export class RemoteQueue {
  private chains = new Map<string, Promise<void>>()
  private logger: Logger

  constructor({ logger }: { logger: Logger }) {
    this.logger = logger
  }

  /** Queue `task` behind any pending task for `messageId`. Returns immediately. */
  submit(messageId: string, description: string, task: RemoteTask): void {
    const previous = this.chains.get(messageId) ?? Promise.resolve()
    const next = previous.then(() => this.run(description, task))
    this.chains.set(messageId, next)
    // Drop the chain once it is the last one queued for this id
    void next.then(() => {
      if (this.chains.get(messageId) === next) this.chains.delete(messageId)
    })
  }

  get pending(): number {
    return this.chains.size
  }

  /** Resolves once every task queued so far has settled. */
  async drain(): Promise<void> {
    while (this.chains.size > 0) {
      await Promise.all(this.chains.values())
    }
  }

  private async run(description: string, task: RemoteTask): Promise<void> {
    try {
      const result = await task()
      if (result instanceof Error) {
        this.logger.error(`Remote ${description} failed`, result)
        return
      }
      this.logger.debug(`Remote ${description} done`)
    } catch (err) {
      this.logger.error(`Remote ${description} threw`, err)
    }
  }
}
