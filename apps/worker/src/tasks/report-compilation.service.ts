import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, IsNull, Repository } from 'typeorm';
import { TextDecoder } from 'util';
import {
  Citation,
  Edge,
  isUniqueViolation,
  isUnstorableValue,
  Network,
  Report,
  ReportStatus,
} from '@biocurate/database';
import {
  CitationRef,
  citationKey,
  CompilationError,
  CompiledGraph,
  GRAPH_COMPILER,
  GraphCompiler,
} from '@biocurate/graph';
import type { TaskName } from '@biocurate/proto';
import { TaskHandler } from './interfaces/task-handler.interface';
import { TaskNotifier } from './task-notifier.service';

/** Rows per INSERT; keeps each statement well under the bind-parameter limit */
const EDGE_INSERT_CHUNK_SIZE = 1000;

/**
 * ReportCompilationService — runs the `compile-report` task.
 *
 * 1. Load the report; a missing or already finished report is a no-op
 * 2. Claim it with a conditional update on (status = pending, started_at IS NULL);
 *    losing the claim means another delivery owns it, so stop
 * 3. Decode and compile the stored document with the report's flags
 * 4. Persist network, citations, edges and the completed report in one
 *    transaction, then notify
 *
 * Compilation errors fail the report, as do (name, version) clashes and
 * values the tables cannot hold. Any other error propagates and leaves the
 * report claimed but pending, which the viewer shows as stalled once it
 * ages past the threshold.
 */
@Injectable()
export class ReportCompilationService implements TaskHandler {
  readonly taskName: TaskName = 'compile-report';

  private readonly logger = new Logger(ReportCompilationService.name);

  constructor(
    @InjectRepository(Report)
    private readonly reportRepository: Repository<Report>,

    @InjectDataSource()
    private readonly dataSource: DataSource,

    @Inject(GRAPH_COMPILER)
    private readonly compiler: GraphCompiler,

    private readonly notifier: TaskNotifier,
  ) {}

  async run(reportId: string, taskId: string): Promise<void> {
    const report = await this.reportRepository.findOne({ where: { id: reportId } });

    if (!report) {
      this.logger.warn(`Report ${reportId} not found; nothing to compile`);
      return;
    }
    if (report.status !== ReportStatus.PENDING) {
      this.logger.log(`Report ${reportId} is already ${report.status}; skipping`);
      return;
    }

    const claimed = await this.claim(reportId, taskId);
    if (!claimed) {
      this.logger.log(`Report ${reportId} was claimed by another delivery; skipping`);
      return;
    }

    const startedAt = Date.now();
    this.logger.log(`Compiling report ${reportId} (${report.sourceName}) as task ${taskId}`);

    let graph: CompiledGraph;
    try {
      const source = await this.loadSource(reportId);
      graph = this.compiler.compile(decodeSource(source, report.encoding), {
        citationClearing: report.citationClearing,
        inferOrigin: report.inferOrigin,
        identifierValidation: report.identifierValidation,
      });
    } catch (err: unknown) {
      if (err instanceof CompilationError) {
        await this.fail(report, `Parsing failed for ${report.sourceName}: ${err.message}`, startedAt);
        return;
      }
      throw err;
    }

    let stored: boolean;
    try {
      stored = await this.persist(report, graph, startedAt);
    } catch (err: unknown) {
      if (isUniqueViolation(err, 'UQ_networks_name_version')) {
        const { name, version } = graph.metadata;
        await this.fail(
          report,
          `Upload failed for ${report.sourceName}: network ${name} v${version} already exists`,
          startedAt,
        );
        return;
      }
      if (isUnstorableValue(err)) {
        const reason = err instanceof Error ? err.message : String(err);
        await this.fail(
          report,
          `Upload failed for ${report.sourceName}: ${reason}`,
          startedAt,
        );
        return;
      }
      throw err;
    }
    if (!stored) {
      return;
    }

    this.logger.log(
      `Report ${reportId} completed: ${graph.nodes.length} nodes, ` +
        `${graph.edges.length} edges, ${graph.warnings.length} warnings`,
    );

    await this.notifier.notify({
      domain: 'report',
      id: report.id,
      ownerId: report.ownerId,
      status: 'completed',
      summary: `${report.sourceName} compiled into ${graph.metadata.name} v${graph.metadata.version}`,
      message: null,
    });
  }

  // ── Private helpers ──────────────────────────────────────

  private async claim(reportId: string, taskId: string): Promise<boolean> {
    const result = await this.reportRepository.update(
      { id: reportId, status: ReportStatus.PENDING, startedAt: IsNull() },
      { startedAt: new Date(), taskId },
    );
    return (result.affected ?? 0) > 0;
  }

  private async loadSource(reportId: string): Promise<Buffer> {
    const row = await this.reportRepository.findOne({
      where: { id: reportId },
      select: { id: true, source: true },
    });
    if (!row) {
      throw new Error(`Report ${reportId} disappeared before compilation`);
    }
    return row.source;
  }

  /** Returns false when an earlier delivery already stored the network. */
  private persist(report: Report, graph: CompiledGraph, startedAt: number): Promise<boolean> {
    return this.dataSource.transaction(async (manager) => {
      const existing = await manager.findOne(Network, {
        where: { reportId: report.id },
        select: { id: true },
      });
      if (existing) {
        this.logger.warn(`Report ${report.id} already has network ${existing.id}`);
        return false;
      }

      const network = await manager.save(
        manager.create(Network, {
          ...graph.metadata,
          public: report.public,
          graph,
          numberNodes: graph.nodes.length,
          numberEdges: graph.edges.length,
          ownerId: report.ownerId,
          reportId: report.id,
        }),
      );

      const citationIds = await this.upsertCitations(manager, graph);

      const rows = graph.edges.map((edge) => ({
        networkId: network.id,
        sourceLabel: edge.source,
        targetLabel: edge.target,
        relation: edge.relation,
        evidence: edge.evidence,
        annotations: edge.annotations,
        hash: edge.hash,
        citationId: edge.citation ? citationIds.get(citationKey(edge.citation)) ?? null : null,
      }));
      for (let offset = 0; offset < rows.length; offset += EDGE_INSERT_CHUNK_SIZE) {
        await manager.insert(Edge, rows.slice(offset, offset + EDGE_INSERT_CHUNK_SIZE));
      }

      await manager.update(Report, report.id, {
        status: ReportStatus.COMPLETED,
        networkId: network.id,
        numberNodes: graph.nodes.length,
        numberEdges: graph.edges.length,
        numberWarnings: graph.warnings.length,
        numberCitations: citationIds.size,
        durationMs: Date.now() - startedAt,
        completedAt: new Date(),
      });
      return true;
    });
  }

  /** Inserts unseen citations and returns citation key → id for the graph's citations. */
  private async upsertCitations(
    manager: EntityManager,
    graph: CompiledGraph,
  ): Promise<Map<string, string>> {
    const unique = new Map<string, CitationRef>();
    for (const edge of graph.edges) {
      if (edge.citation) {
        unique.set(citationKey(edge.citation), edge.citation);
      }
    }

    const ids = new Map<string, string>();
    if (unique.size === 0) {
      return ids;
    }

    const refs = [...unique.values()];
    await manager.upsert(Citation, refs, {
      conflictPaths: ['db', 'reference'],
      skipUpdateIfNoValuesChanged: true,
    });

    const stored = await manager.find(Citation, {
      where: refs.map(({ db, reference }) => ({ db, reference })),
    });
    for (const citation of stored) {
      ids.set(citationKey(citation), citation.id);
    }
    return ids;
  }

  private async fail(report: Report, message: string, startedAt: number): Promise<void> {
    const result = await this.reportRepository.update(
      { id: report.id, status: ReportStatus.PENDING },
      {
        status: ReportStatus.FAILED,
        message,
        durationMs: Date.now() - startedAt,
        completedAt: new Date(),
      },
    );
    if (!result.affected) {
      this.logger.warn(`Report ${report.id} is no longer pending; failure not recorded`);
      return;
    }

    this.logger.warn(`Report ${report.id} failed: ${message}`);
    await this.notifier.notify({
      domain: 'report',
      id: report.id,
      ownerId: report.ownerId,
      status: 'failed',
      summary: message,
      message,
    });
  }
}

/** Strict decode: bytes that are not valid in the stored encoding fail the report. */
function decodeSource(source: Buffer, encoding: string): string {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding, { fatal: true });
  } catch {
    throw new CompilationError(`unsupported encoding "${encoding}"`);
  }
  try {
    return decoder.decode(source);
  } catch {
    throw new CompilationError(`the document is not valid ${encoding} text`);
  }
}
