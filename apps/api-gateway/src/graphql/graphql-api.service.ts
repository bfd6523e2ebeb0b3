import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { Network, Report } from '@biocurate/database';
import type { RequestUser } from '../auth';
import { NetworkAccessService, toNetworkView } from '../networks';
import type { NetworkViewDto } from '../networks';
import { ReportViewService } from '../reports/report-view';
import { ReportNotFoundException } from '../reports/exceptions';
import type { ReportViewDto } from '../reports/dto';

/**
 * GraphqlApiService — read access for the GraphQL browse surface.
 *
 * Applies the same visibility rules and view models as the REST
 * controllers: reports are the owner's (admins see all), networks follow
 * NetworkAccessService.
 */
@Injectable()
export class GraphqlApiService {
  private readonly logger = new Logger(GraphqlApiService.name);

  constructor(
    @InjectRepository(Report)
    private readonly reportRepository: Repository<Report>,

    private readonly reportView: ReportViewService,
    private readonly access: NetworkAccessService,
  ) {}

  // ── Reports ─────────────────────────────────────────────────

  async findReports(user: RequestUser): Promise<ReportViewDto[]> {
    this.logger.debug(`Fetching reports for user ${user.userId}`);

    const reports = await this.reportRepository.find({
      where: user.isAdmin ? {} : { ownerId: user.userId },
      order: { createdAt: 'DESC' },
    });
    const now = new Date();
    return reports.map((report) => this.reportView.present(report, now));
  }

  async findReportById(reportId: string, user: RequestUser): Promise<ReportViewDto> {
    const where: FindOptionsWhere<Report> = user.isAdmin
      ? { id: reportId }
      : { id: reportId, ownerId: user.userId };
    const report = await this.reportRepository.findOne({ where });
    if (!report) {
      throw new ReportNotFoundException(reportId);
    }
    return this.reportView.present(report);
  }

  // ── Networks ────────────────────────────────────────────────

  async findNetworks(user: RequestUser): Promise<NetworkViewDto[]> {
    const networks = await this.access
      .readableNetworks(user)
      .orderBy('network.createdAt', 'DESC')
      .getMany();
    return networks.map(toNetworkView);
  }

  async findNetworkById(networkId: string, user: RequestUser): Promise<NetworkViewDto> {
    return toNetworkView(await this.access.findReadable(networkId, user));
  }

  /** The loaded network as a view, or null when the reader may not see it. */
  async presentIfReadable(
    network: Network | null,
    user: RequestUser,
  ): Promise<NetworkViewDto | null> {
    if (!network || !(await this.access.canRead(network, user))) {
      return null;
    }
    return toNetworkView(network);
  }
}
