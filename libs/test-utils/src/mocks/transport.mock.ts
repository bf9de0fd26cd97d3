import { Transport } from '@muxpool/connection-pool';

export class MockTransport implements Transport {
  private static nextId = 0;

  readonly id: number;
  isOpen: boolean = true;
  finishCalls: number = 0;
  private listeners = new Set<(isActive: boolean) => void>();

  constructor(public readonly authority: string) {
    this.id = ++MockTransport.nextId;
  }

  finish(): void {
    this.finishCalls++;
    this.isOpen = false;
  }

  onActiveStateChanged(listener: (isActive: boolean) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // Helpers to drive the transport from tests
  setActive(isActive: boolean): void {
    for (const listener of Array.from(this.listeners)) {
      listener(isActive);
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
