import type { ScrollCursor } from '../../domain/model/Session.js';
import type { ReaderContext } from '../ReaderContext.js';
import { SelectNode } from './SelectNode.js';

/** Use case: select a node and keep its session on the context. */
export class OpenReader<C extends ScrollCursor> {
  constructor(private readonly ctx: ReaderContext<C>) {}

  async execute(): Promise<void> {
    if (this.ctx.status !== 'CREATED') {
      throw new Error(`Cannot open reader from status '${this.ctx.status}'`);
    }
    this.ctx.transitionTo('CONNECTING');

    try {
      this.ctx.session = await new SelectNode(this.ctx).execute();
    } catch (error) {
      this.ctx.fail(error);
      throw error;
    }

    this.ctx.transitionTo('OPEN');
  }
}
