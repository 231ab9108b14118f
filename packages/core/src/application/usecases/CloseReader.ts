import type { ScrollCursor } from '../../domain/model/Session.js';
import type { ReaderContext } from '../ReaderContext.js';

/** Use case: release the scroll and move to `CLOSED`. Calling it again is a no-op. */
export class CloseReader<C extends ScrollCursor> {
  constructor(private readonly ctx: ReaderContext<C>) {}

  async execute(): Promise<void> {
    if (this.ctx.status === 'CLOSED') return;
    if (this.ctx.status === 'CONNECTING') {
      throw new Error('Cannot close reader while it is connecting');
    }

    try {
      await this.ctx.releaseCursor();
    } finally {
      this.ctx.transitionTo('CLOSED');
      this.ctx.eventBus.emit({
        type: 'source:closed',
        readerId: this.ctx.readerId,
        pagesRead: this.ctx.pagesRead,
        rowsRead: this.ctx.rowsRead,
        timestamp: Date.now(),
      });
    }
  }
}
