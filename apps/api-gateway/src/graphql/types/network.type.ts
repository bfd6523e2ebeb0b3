import { ObjectType, Field, ID, Int } from '@nestjs/graphql';

/** GraphQL ObjectType for a compiled network; mirrors NetworkViewDto. */
@ObjectType('Network')
export class NetworkType {
  @Field(() => ID)
  id!: string;

  @Field(() => String)
  name!: string;

  @Field(() => String)
  version!: string;

  @Field(() => String, { nullable: true })
  description!: string | null;

  @Field(() => String, { nullable: true })
  authors!: string | null;

  @Field(() => String, { nullable: true })
  contact!: string | null;

  @Field(() => String, { nullable: true })
  license!: string | null;

  @Field(() => Boolean)
  public!: boolean;

  @Field(() => Int)
  numberNodes!: number;

  @Field(() => Int)
  numberEdges!: number;

  @Field(() => String, { description: 'Owner user ID (UUID)' })
  ownerId!: string;

  @Field(() => String, { description: 'Report that produced this network (UUID)' })
  reportId!: string;

  @Field(() => String, { description: 'ISO timestamp' })
  createdAt!: string;
}
