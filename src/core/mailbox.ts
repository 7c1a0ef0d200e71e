import { BufferClosedError } from './errors.ts'

type TPendingSend<T> = {
  item: T
  resolve: () => void
  reject: (error: Error) => void
}

export type TMailboxOptions = {
  /** Items held before `send` starts to wait. Must be at least 1. */
  capacity: number
}

/**
 * Single-consumer FIFO with bounded capacity.
 *
 * `send` waits while the mailbox is full and waiting senders are admitted in call order,
 * so an item sent after another is always received after it. `post` skips the capacity
 * check and is meant for control messages whose ordering does not matter.
 */
export class Mailbox<T> {
  private readonly capacity: number
  private items: T[] = []
  private pendingSends: TPendingSend<T>[] = []
  private receiver: ((item: T) => void) | null = null
  private closedReason: Error | null = null

  constructor(options: TMailboxOptions) {
    this.capacity = Math.max(1, options.capacity)
  }

  public get size(): number {
    return this.items.length
  }

  public get waitingSenders(): number {
    return this.pendingSends.length
  }

  public get isClosed(): boolean {
    return this.closedReason !== null
  }

  public send(item: T): Promise<void> {
    if (this.closedReason) return Promise.reject(this.closedReason)

    if (this.pendingSends.length === 0 && this.items.length < this.capacity) {
      this.deliver(item)
      return Promise.resolve()
    }

    return new Promise<void>((resolve, reject) => {
      this.pendingSends.push({ item, resolve, reject })
    })
  }

  public post(item: T): void {
    if (this.closedReason) throw this.closedReason
    this.deliver(item)
  }

  public receive(): Promise<T> {
    if (this.closedReason) return Promise.reject(this.closedReason)
    if (this.receiver) return Promise.reject(new Error('Mailbox already has a waiting receiver'))

    const next = this.items.shift()
    if (next !== undefined) {
      this.admitPendingSend()
      return Promise.resolve(next)
    }

    return new Promise<T>((resolve) => {
      this.receiver = resolve
    })
  }

  /**
   * Rejects every waiting and future `send` with `reason`.
   * Returns the items that were queued but never received.
   */
  public close(reason: Error = new BufferClosedError()): T[] {
    if (this.closedReason) return []
    this.closedReason = reason

    const leftover = this.items
    this.items = []
    for (const pending of this.pendingSends) pending.reject(reason)
    this.pendingSends = []
    this.receiver = null
    return leftover
  }

  private deliver(item: T): void {
    const receiver = this.receiver
    if (receiver) {
      this.receiver = null
      receiver(item)
      return
    }
    this.items.push(item)
  }

  private admitPendingSend(): void {
    if (this.items.length >= this.capacity) return
    const pending = this.pendingSends.shift()
    if (!pending) return
    this.items.push(pending.item)
    pending.resolve()
  }
}
