import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { User } from '@biocurate/database';
import {
  RedisPublisherService,
  StatusDomain,
  TerminalStatus,
} from '@biocurate/redis';

export interface TaskOutcome {
  domain: StatusDomain;
  id: string;
  ownerId: string;
  status: TerminalStatus;
  /** One-line summary for the owner, e.g. the report's failure message */
  summary: string;
  message: string | null;
}

/**
 * Announces terminal task outcomes.
 *
 * Always called after the terminal write has committed. Never throws:
 * the row is already final, so a lost notification only delays the
 * owner seeing it.
 */
@Injectable()
export class TaskNotifier {
  private readonly logger = new Logger(TaskNotifier.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    private readonly publisher: RedisPublisherService,
  ) {}

  async notify(outcome: TaskOutcome): Promise<void> {
    try {
      await this.publisher.publishStatus({
        domain: outcome.domain,
        id: outcome.id,
        status: outcome.status,
        message: outcome.message,
        emittedAt: new Date().toISOString(),
      });
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(
        `Failed to publish ${outcome.domain} ${outcome.id} status: ${message}`,
      );
    }

    await this.mailOwner(outcome);
  }

  // Mail delivery is out of scope; the summary goes to the log instead.
  private async mailOwner(outcome: TaskOutcome): Promise<void> {
    try {
      const owner = await this.userRepository.findOne({
        where: { id: outcome.ownerId },
        select: { id: true, email: true },
      });
      if (!owner) {
        return;
      }
      this.logger.log(`Mail to ${owner.email}: ${outcome.summary}`);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Failed to look up owner ${outcome.ownerId}: ${message}`);
    }
  }
}
