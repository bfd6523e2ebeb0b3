// ── Entities ────────────────────────────────────────────────
export { User } from './entities/user.entity';
export { Report } from './entities/report.entity';
export { Network } from './entities/network.entity';
export { Citation } from './entities/citation.entity';
export { Edge } from './entities/edge.entity';
export { EdgeVote } from './entities/edge-vote.entity';
export { EdgeComment } from './entities/edge-comment.entity';
export { Project } from './entities/project.entity';
export { Query } from './entities/query.entity';
export { Omic } from './entities/omic.entity';
export { Experiment } from './entities/experiment.entity';
export { ENTITIES } from './entities';

// ── Enums ───────────────────────────────────────────────────
export { ReportStatus } from './enums/report-status.enum';
export { ExperimentStatus } from './enums/experiment-status.enum';

// ── Errors ──────────────────────────────────────────────────
export { isUniqueViolation, isUnstorableValue } from './database.errors';

// ── Module ──────────────────────────────────────────────────
export { DatabaseModule } from './database.module';
