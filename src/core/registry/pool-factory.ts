// ================================================================================================
// POOL FACTORY: deploys pools from registered implementations at deterministic addresses
// ================================================================================================

import { getCreate2Address, keccak256, solidityPacked } from 'ethers';
import { createLogger, type Logger } from '@/utils';
import { ensure } from '../errors';
import type { Ledger, Stateful } from '../ledger/ledger';
import { IndexPool, type IndexPoolInput } from '../pool/index-pool';
import { ImplementationRegistry } from './implementation-registry';

export const POOL_IMPLEMENTATION_NAME = 'IndexPool';

export interface PoolDeployParams {
  name: string;
  symbol: string;
  controller: string;
}

export type PoolRegistry = ImplementationRegistry<IndexPoolInput, IndexPool>;

export interface PoolFactoryInput {
  logger: Logger;
  ledger: Ledger;
  address: string;
  owner: string;
  registry: PoolRegistry;
}

interface DeployedPool {
  implementationID: string;
  version: number;
}

interface PoolFactoryState {
  approvedDeployers: Set<string>;
  deployed: Map<string, DeployedPool>;
}

export class PoolFactory implements Stateful<PoolFactoryState> {
  private readonly logger: Logger;
  private readonly ledger: Ledger;
  private readonly registry: PoolRegistry;
  readonly address: string;
  private readonly owner: string;

  private approvedDeployers: Set<string> = new Set();
  private deployed: Map<string, DeployedPool> = new Map();

  constructor(input: PoolFactoryInput) {
    this.logger = input.logger;
    this.ledger = input.ledger;
    this.registry = input.registry;
    this.address = input.address;
    this.owner = input.owner;
    this.ledger.register(this);
  }

  // ── Deployer approval ──

  approvePoolController(caller: string, deployer: string): void {
    this.ledger.transact(() => {
      ensure(caller === this.owner, 'ERR_NOT_OWNER');
      this.approvedDeployers.add(deployer);
    });
  }

  disapprovePoolController(caller: string, deployer: string): void {
    this.ledger.transact(() => {
      ensure(caller === this.owner, 'ERR_NOT_OWNER');
      this.approvedDeployers.delete(deployer);
    });
  }

  isApprovedController(deployer: string): boolean {
    return this.approvedDeployers.has(deployer);
  }

  // ── Deployment ──

  /** Address a pool deployed by `deployer` with `suppliedSalt` will have */
  computePoolAddress(implementationID: string, deployer: string, suppliedSalt: string): string {
    const salt = keccak256(solidityPacked(['address', 'bytes32'], [deployer, suppliedSalt]));
    return getCreate2Address(this.address, salt, keccak256(implementationID));
  }

  /**
   * 🏭 DEPLOY POOL: approved deployers only. The salt is bound to the deployer, so two
   * controllers never collide.
   */
  deployPool(caller: string, implementationID: string, suppliedSalt: string, params: PoolDeployParams): IndexPool {
    return this.ledger.transact(() => {
      ensure(this.approvedDeployers.has(caller), 'ERR_NOT_APPROVED', `${caller} may not deploy pools`);
      const implementation = this.registry.resolve(implementationID);
      const address = this.computePoolAddress(implementationID, caller, suppliedSalt);
      ensure(!this.deployed.has(address), 'ERR_POOL_EXISTS', address);

      const pool = implementation.create({
        logger: createLogger(`[Pool ${params.symbol}]`),
        ledger: this.ledger,
        address,
        ...params,
      });
      this.deployed.set(address, { implementationID, version: implementation.version });
      this.logger.info(`🏭 deployed ${implementation.name} v${implementation.version} at ${address}`);
      return pool;
    });
  }

  isRecognizedPool(address: string): boolean {
    return this.deployed.has(address);
  }

  getDeployment(address: string): DeployedPool | undefined {
    const deployment = this.deployed.get(address);
    return deployment ? { ...deployment } : undefined;
  }

  captureState(): PoolFactoryState {
    return structuredClone({ approvedDeployers: this.approvedDeployers, deployed: this.deployed });
  }

  restoreState(state: PoolFactoryState): void {
    this.approvedDeployers = state.approvedDeployers;
    this.deployed = state.deployed;
  }
}

/** Registry preloaded with the standard pool implementation */
export function createPoolRegistry(logger: Logger, ledger: Ledger, owner: string): PoolRegistry {
  const registry: PoolRegistry = new ImplementationRegistry({ logger, ledger, owner });
  registry.setImplementation(owner, POOL_IMPLEMENTATION_NAME, (input) => new IndexPool(input));
  return registry;
}
