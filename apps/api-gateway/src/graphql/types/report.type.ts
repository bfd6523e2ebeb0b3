import { ObjectType, Field, ID, Int } from '@nestjs/graphql';
import type { ReportViewStatus } from '../../reports/report-view';
import { ReportViewStatusEnum } from '../enums';
import { NetworkType } from './network.type';

/**
 * GraphQL ObjectType for a report; mirrors ReportViewDto.
 *
 * `network` is resolved through NetworkLoader in the resolver, not loaded
 * with the report.
 */
@ObjectType('Report')
export class ReportType {
  @Field(() => ID)
  id!: string;

  @Field(() => String)
  sourceName!: string;

  @Field(() => String, { description: 'sha512 of the uploaded bytes (hex)' })
  sourceHash!: string;

  @Field(() => ReportViewStatusEnum)
  status!: ReportViewStatus;

  @Field(() => String, { nullable: true })
  message!: string | null;

  @Field(() => Boolean)
  public!: boolean;

  @Field(() => Boolean)
  citationClearing!: boolean;

  @Field(() => Boolean)
  inferOrigin!: boolean;

  @Field(() => Boolean)
  identifierValidation!: boolean;

  @Field(() => Int, { nullable: true })
  numberNodes!: number | null;

  @Field(() => Int, { nullable: true })
  numberEdges!: number | null;

  @Field(() => Int, { nullable: true })
  numberWarnings!: number | null;

  @Field(() => Int, { nullable: true })
  numberCitations!: number | null;

  @Field(() => Int, { nullable: true })
  durationMs!: number | null;

  @Field(() => String, { nullable: true })
  networkId!: string | null;

  @Field(() => String)
  ownerId!: string;

  @Field(() => String)
  createdAt!: string;

  @Field(() => String, { nullable: true })
  startedAt!: string | null;

  @Field(() => String, { nullable: true })
  completedAt!: string | null;

  @Field(() => NetworkType, {
    nullable: true,
    description: 'The network this report produced, when completed and still readable',
  })
  network?: NetworkType | null;
}
