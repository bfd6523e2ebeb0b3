export class OmicViewDto {
  id!: string;
  sourceName!: string;
  description!: string | null;
  geneColumn!: string;
  dataColumn!: string;
  numberGenes!: number;
  public!: boolean;
  ownerId!: string;

  /** ISO timestamp */
  createdAt!: string;
}

/** GET /omics/:id adds the gene → value table */
export class OmicDetailDto extends OmicViewDto {
  data!: Record<string, number>;
}
