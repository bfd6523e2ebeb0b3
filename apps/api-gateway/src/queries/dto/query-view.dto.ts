import type { PipelineEntry, SeedingEntry } from '@biocurate/graph';

/** A stored query, exactly as it was created */
export class QueryViewDto {
  id!: string;
  ownerId!: string;
  networkIds!: string[];
  assemblyHash!: string;
  seeding!: SeedingEntry[];
  pipeline!: PipelineEntry[];
  parentId!: string | null;
  public!: boolean;
  /** ISO timestamp */
  createdAt!: string;
}
