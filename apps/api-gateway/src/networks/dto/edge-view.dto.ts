export class CitationViewDto {
  id!: string;
  db!: string;
  reference!: string;
  title!: string | null;
}

export class EdgeViewDto {
  id!: string;
  networkId!: string;
  source!: string;
  target!: string;
  relation!: string;
  evidence!: string | null;
  annotations!: Record<string, string>;
  citation!: CitationViewDto | null;
}
