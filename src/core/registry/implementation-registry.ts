// ================================================================================================
// IMPLEMENTATION REGISTRY: versioned constructors looked up by implementation ID
//
// An implementation ID is the keccak256 of a readable name. Replacing an implementation
// bumps its version; instances already created keep the code they were built with.
// ================================================================================================

import { id } from 'ethers';
import type { Logger } from '@/utils';
import { ensure } from '../errors';
import type { Ledger, Stateful } from '../ledger/ledger';

export interface Implementation<P, T> {
  implementationID: string;
  name: string;
  version: number;
  create: (params: P) => T;
}

export interface ImplementationRegistryInput {
  logger: Logger;
  ledger: Ledger;
  owner: string;
}

type RegistryState<P, T> = {
  owner: string;
  implementations: Map<string, Implementation<P, T>>;
};

/** Implementation ID for a readable name */
export function implementationIdFor(name: string): string {
  return id(name);
}

export class ImplementationRegistry<P, T> implements Stateful<RegistryState<P, T>> {
  private readonly logger: Logger;
  private readonly ledger: Ledger;

  private owner: string;
  private implementations: Map<string, Implementation<P, T>> = new Map();

  constructor(input: ImplementationRegistryInput) {
    this.logger = input.logger;
    this.ledger = input.ledger;
    this.owner = input.owner;
    this.ledger.register(this);
  }

  /**
   * 📦 SET IMPLEMENTATION: register or replace the constructor behind `name`
   * @returns the implementation ID
   */
  setImplementation(caller: string, name: string, create: (params: P) => T): string {
    return this.ledger.transact(() => {
      ensure(caller === this.owner, 'ERR_NOT_OWNER');
      const implementationID = implementationIdFor(name);
      const version = (this.implementations.get(implementationID)?.version ?? 0) + 1;
      this.implementations.set(implementationID, { implementationID, name, version, create });
      this.logger.info(`📦 ${name} v${version} registered`);
      return implementationID;
    });
  }

  resolve(implementationID: string): Implementation<P, T> {
    const implementation = this.implementations.get(implementationID);
    ensure(implementation !== undefined, 'ERR_UNKNOWN_IMPLEMENTATION', implementationID);
    return implementation;
  }

  has(implementationID: string): boolean {
    return this.implementations.has(implementationID);
  }

  // Entries are replaced, never mutated, so a shallow copy is a full snapshot
  captureState(): RegistryState<P, T> {
    return { owner: this.owner, implementations: new Map(this.implementations) };
  }

  restoreState(state: RegistryState<P, T>): void {
    this.owner = state.owner;
    this.implementations = state.implementations;
  }
}
