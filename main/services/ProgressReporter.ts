import { getLogService, LogService } from './LogService'
import { errorMessage } from '../utils/errors'
import type { ProgressSample } from '../../src/types/transfer'

export type ProgressListener = (sample: ProgressSample) => void

/**
 * ProgressReporter — hands progress samples from the transfer to an observer.
 *
 * Samples are coalesced into a single latest-value slot and delivered on a
 * later macrotask, so a slow observer never stalls the stream. Samples that
 * would move progress backwards are dropped. Call flush() once the transfer
 * body is done to deliver the final sample synchronously.
 */
export class ProgressReporter {
  private listener: ProgressListener
  private pending: ProgressSample | null = null
  private lastDelivered: ProgressSample | null = null
  private scheduled: NodeJS.Immediate | null = null
  private log: LogService
  private attemptId: string

  constructor(listener: ProgressListener, attemptId: string, log: LogService = getLogService()) {
    this.listener = listener
    this.attemptId = attemptId
    this.log = log
  }

  report(sample: ProgressSample): void {
    const newest = this.pending ?? this.lastDelivered
    if (newest && sample.transferredBytes < newest.transferredBytes) return

    this.pending = { transferredBytes: sample.transferredBytes, totalBytes: sample.totalBytes }
    if (!this.scheduled) {
      this.scheduled = setImmediate(() => {
        this.scheduled = null
        this.deliver()
      })
    }
  }

  /** Deliver the pending sample now, if any */
  flush(): void {
    if (this.scheduled) {
      clearImmediate(this.scheduled)
      this.scheduled = null
    }
    this.deliver()
  }

  private deliver(): void {
    const sample = this.pending
    if (!sample) return
    this.pending = null
    this.lastDelivered = sample

    try {
      this.listener(sample)
    } catch (err) {
      // Observer failures never abort the transfer
      this.log.log(this.attemptId, 'warning', 'system', 'Progress observer threw.', errorMessage(err))
    }
  }
}
