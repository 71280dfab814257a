import type { Observer } from "../core/types.js";
import type { Dispatcher } from "./event-dispatcher.js";

export type Bootstrap = readonly [selector: string, observer: Observer];

/**
 * Ordered list of observers to register on every dispatcher it is installed
 * on. Installing copies the pairs; the list stays as it is and can be
 * installed again.
 */
export class BootstrapMixin {
  private readonly entries: Bootstrap[] = [];

  get bootstraps(): readonly Bootstrap[] {
    return this.entries;
  }

  addBootstrap(selector: string, observer: Observer): void {
    this.entries.push([selector, observer]);
  }

  removeBootstrap(selector: string, observer: Observer): void {
    const index = this.entries.findIndex(
      ([entrySelector, entryObserver]) => entrySelector === selector && entryObserver === observer
    );
    if (index >= 0) {
      this.entries.splice(index, 1);
    }
  }

  installBootstraps(target: Dispatcher): void {
    for (const [selector, observer] of this.entries) {
      target.addObserver(selector, observer);
    }
  }
}
