import { runBestEffort } from '../../../platform/logging/best-effort';
import type { LockoutLogger } from './lockout.logger';
import type { LockoutEventHandler, UserLockedOutEvent } from './lockout.types';

type Subscription = Readonly<{ handler: LockoutEventHandler }>;

export class LockoutEventChannel {
  private readonly subscriptions = new Set<Subscription>();

  constructor(private readonly logger: LockoutLogger) {}

  /** The same handler may subscribe twice; each returned function removes one subscription. */
  subscribe(handler: LockoutEventHandler): () => void {
    const subscription: Subscription = { handler };
    this.subscriptions.add(subscription);
    return () => {
      this.subscriptions.delete(subscription);
    };
  }

  async publish(event: UserLockedOutEvent): Promise<void> {
    for (const subscription of [...this.subscriptions]) {
      await runBestEffort({
        logger: this.logger,
        operation: 'lockout.userLockedOut',
        run: () => subscription.handler(event),
        context: { username: event.username, ipAddress: event.ipAddress },
      });
    }
  }
}
