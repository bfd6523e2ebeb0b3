import { StreamableFile } from '@nestjs/common';
import { exportGraph, ExportableGraph, isExportFormat } from '@biocurate/graph';
import { UnsupportedExportFormatException } from './exceptions';

/**
 * Serializes `graph` as a download named `{baseName}.{extension}`.
 * Throws UnsupportedExportFormatException for unknown formats.
 */
export function toExportFile(
  graph: ExportableGraph,
  format: string,
  baseName: string,
): StreamableFile {
  if (!isExportFormat(format)) {
    throw new UnsupportedExportFormatException(format);
  }
  const { content, contentType, extension } = exportGraph(graph, format);
  const body = Buffer.from(content, 'utf-8');
  const fileName = `${baseName}.${extension}`.replace(/[^A-Za-z0-9._-]+/g, '_');

  return new StreamableFile(body, {
    type: `${contentType}; charset=utf-8`,
    disposition: `attachment; filename="${fileName}"`,
    length: body.length,
  });
}
