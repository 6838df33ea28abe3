/**
 * artifactSink.ts — Where finished documents and failure snapshots go.
 *
 * Layout under the output directory:
 *
 *   <jobId>-<templateId>-<locale>.<ext>
 *   diagnostics/<jobId>-attempt<N>.json
 *
 * The result store only ever sees the paths written here.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { DiagnosticSnapshot } from '../core/errors';
import { Logger } from '../core/logger';
import type { ArtifactRef, ReportArtifact } from '../core/types';

const logger = new Logger('ArtifactSink');

export interface ArtifactSink {
  writeArtifact(artifact: ReportArtifact): Promise<ArtifactRef>;
  /** Returns the reference callers may show (a path, never the snapshot itself). */
  writeDiagnostic(jobId: string, attempt: number, snapshot: DiagnosticSnapshot): Promise<string>;
}

export class FileArtifactSink implements ArtifactSink {
  constructor(private readonly outputDir: string) {}

  async writeArtifact(artifact: ReportArtifact): Promise<ArtifactRef> {
    await mkdir(this.outputDir, { recursive: true });
    const path = join(this.outputDir, artifact.fileName);
    await writeFile(path, artifact.content);

    logger.info(`Wrote ${artifact.format} report ${path} (${artifact.content.length} bytes)`);
    return {
      id: artifact.id,
      jobId: artifact.jobId,
      locale: artifact.locale,
      templateId: artifact.templateId,
      format: artifact.format,
      path,
    };
  }

  async writeDiagnostic(
    jobId: string,
    attempt: number,
    snapshot: DiagnosticSnapshot,
  ): Promise<string> {
    const dir = join(this.outputDir, 'diagnostics');
    await mkdir(dir, { recursive: true });
    const path = join(dir, `${jobId}-attempt${attempt}.json`);
    await writeFile(path, JSON.stringify(snapshot, null, 2), 'utf-8');

    logger.info(`Saved page snapshot from ${snapshot.step} to ${path}`);
    return path;
  }
}
