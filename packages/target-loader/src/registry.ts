/**
 * Rigging Target Loader — Interface Registry
 *
 * Built interfaces, addressed by component and command name
 * (`sensor` / `process`). A component groups the sub-interfaces the CLI
 * attaches under one command.
 *
 * Registration order is preserved; the CLI lists sub-interfaces in the
 * order they were registered.
 */

import type { ConfigInterface, ManagerInterface } from '@rigging/kernel';

export type RegisteredInterface =
  | {
      readonly kind: 'manager';
      readonly component: string;
      readonly iface: ManagerInterface<unknown>;
    }
  | {
      readonly kind: 'config';
      readonly component: string;
      readonly iface: ConfigInterface<unknown>;
      /** Persist the configuration object after a mutating pass. */
      commit(): void;
    };

function keyOf(component: string, name: string): string {
  return `${component}/${name}`;
}

export class InterfaceRegistry {
  private readonly entries = new Map<string, RegisteredInterface>();

  /**
   * @throws {Error} If the component already has an interface with this name
   */
  register(entry: RegisteredInterface): void {
    const key = keyOf(entry.component, entry.iface.name);
    if (this.entries.has(key)) {
      throw new Error(`Interface "${entry.iface.name}" is already registered for component "${entry.component}"`);
    }
    this.entries.set(key, entry);
  }

  get(component: string, name: string): RegisteredInterface | undefined {
    return this.entries.get(keyOf(component, name));
  }

  list(): RegisteredInterface[] {
    return [...this.entries.values()];
  }

  /** Component names, in first-registration order. */
  components(): string[] {
    return [...new Set(this.list().map((entry) => entry.component))];
  }

  forComponent(component: string): RegisteredInterface[] {
    return this.list().filter((entry) => entry.component === component);
  }
}
