import { Injectable, Scope } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, In } from 'typeorm';
import DataLoader from 'dataloader';
import { Network } from '@biocurate/database';

/**
 * Request-scoped DataLoader that batches networkId → Network lookups.
 *
 * Used by ReportsResolver to resolve `network` on every report of a list
 * in one `WHERE id IN (...)` query. Access is checked by the caller.
 */
@Injectable({ scope: Scope.REQUEST })
export class NetworkLoader {
  private readonly loader: DataLoader<string, Network | null>;

  constructor(
    @InjectRepository(Network)
    private readonly networkRepository: Repository<Network>,
  ) {
    this.loader = new DataLoader<string, Network | null>(
      (networkIds) => this.batchLoadByIds(networkIds),
    );
  }

  async loadById(networkId: string): Promise<Network | null> {
    return this.loader.load(networkId);
  }

  /** Same length and order as `networkIds`; null for ids with no row. */
  private async batchLoadByIds(
    networkIds: readonly string[],
  ): Promise<(Network | null)[]> {
    const networks = await this.networkRepository.find({
      where: { id: In([...networkIds]) },
    });

    const networkMap = new Map<string, Network>();
    for (const network of networks) {
      networkMap.set(network.id, network);
    }

    return networkIds.map((id) => networkMap.get(id) ?? null);
  }
}
