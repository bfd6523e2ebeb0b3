// ── Module ──────────────────────────────────────────────────
export { AuthModule } from './auth.module';

// ── Route protection ────────────────────────────────────────
export { JwtAuthGuard } from './guards';
export { CurrentUser } from './decorators';

// ── Types ───────────────────────────────────────────────────
export type { RequestUser } from './interfaces';
