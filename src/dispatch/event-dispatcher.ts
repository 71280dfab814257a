import type { Observer } from "../core/types.js";

/** Anything observers can be registered on and events dispatched through. */
export interface Dispatcher {
  addObserver(selector: string, observer: Observer, priority?: number): void;
  removeObserver(selector: string, observer: Observer): void;
  dispatch(payload: unknown, selector: string): boolean;
}

interface Registration {
  observer: Observer;
  priority: number;
  once: boolean;
}

/**
 * Selector keyed observer registry. Observers for one selector run in
 * descending priority, and in registration order within a priority.
 *
 * `dispatch` works on a snapshot of the list: registrations added or removed
 * by an observer apply from the next dispatch on. Observer exceptions are not
 * caught.
 */
export class EventDispatcher implements Dispatcher {
  private readonly observers = new Map<string, Registration[]>();

  addObserver(selector: string, observer: Observer, priority = 0): void {
    this.register(selector, { observer, priority, once: false });
  }

  addOnetimeObserver(selector: string, observer: Observer, priority = 0): void {
    this.register(selector, { observer, priority, once: true });
  }

  /** Removes the first matching registration. Unknown pairs are ignored. */
  removeObserver(selector: string, observer: Observer): void {
    const list = this.observers.get(selector);
    if (!list) {
      return;
    }
    const index = list.findIndex((registration) => registration.observer === observer);
    if (index < 0) {
      return;
    }
    list.splice(index, 1);
    if (list.length === 0) {
      this.observers.delete(selector);
    }
  }

  dispatch(payload: unknown, selector: string): boolean {
    const list = this.observers.get(selector);
    if (!list || list.length === 0) {
      return false;
    }
    const snapshot = list.slice();
    if (snapshot.some((registration) => registration.once)) {
      const remaining = list.filter((registration) => !registration.once);
      if (remaining.length === 0) {
        this.observers.delete(selector);
      } else {
        this.observers.set(selector, remaining);
      }
    }
    for (const registration of snapshot) {
      registration.observer(payload);
    }
    return true;
  }

  hasObservers(selector: string): boolean {
    return this.observerCount(selector) > 0;
  }

  observerCount(selector: string): number {
    return this.observers.get(selector)?.length ?? 0;
  }

  clearObservers(selector?: string): void {
    if (selector === undefined) {
      this.observers.clear();
      return;
    }
    this.observers.delete(selector);
  }

  private register(selector: string, registration: Registration): void {
    let list = this.observers.get(selector);
    if (!list) {
      list = [];
      this.observers.set(selector, list);
    }
    let index = list.length;
    while (index > 0 && list[index - 1].priority < registration.priority) {
      index -= 1;
    }
    list.splice(index, 0, registration);
  }
}
