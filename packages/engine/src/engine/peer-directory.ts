import { BehaviorSubject, type Observable, type Subscription } from 'rxjs';

/**
 * Read-only view of the peers discovery currently knows about.
 *
 * Populated entirely by the transport's discovery; the engine only reads it.
 */
export class PeerDirectory {
  private readonly peers$ = new BehaviorSubject<ReadonlySet<string>>(new Set());
  private readonly subscription: Subscription;

  constructor(source$: Observable<ReadonlySet<string>>) {
    this.subscription = source$.subscribe({
      next: (peers) => this.peers$.next(new Set(peers)),
      error: () => this.peers$.next(new Set()),
      complete: () => this.peers$.next(new Set()),
    });
  }

  /** Known peer identities, sorted */
  list(): string[] {
    return Array.from(this.peers$.getValue()).sort();
  }

  dispose(): void {
    this.subscription.unsubscribe();
    this.peers$.complete();
  }
}
