import type { InjectedRequest } from "./types";

// FIFO by push order. Pushes arrive in worker-completion order, which is not
// necessarily the order the batches were triggered in.
export class InjectionQueue {
  private items: InjectedRequest[] = [];

  push(item: InjectedRequest): number {
    this.items.push(item);
    return this.items.length;
  }

  shift(): InjectedRequest | undefined {
    return this.items.shift();
  }

  get length(): number {
    return this.items.length;
  }

  list(): InjectedRequest[] {
    return [...this.items];
  }
}
