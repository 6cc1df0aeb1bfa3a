import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { DeploymentRunRow } from '../database/entities/deployment-run.entity';
import { PipelineRun, RunReport, toRunReport } from '../pipeline/pipeline-run';

/** Write-once store for run reports. */
@Injectable()
export class DeploymentRunRepository {
  constructor(private readonly dataSource: DataSource) {}

  private get repo() {
    return this.dataSource.getRepository(DeploymentRunRow);
  }

  async save(run: PipelineRun): Promise<RunReport> {
    const report = toRunReport(run);
    await this.repo.insert({
      id: run.id,
      target_id: run.targetId,
      image_ref: run.imageRef,
      selector: { labels: run.selector.labels, liveness: run.selector.liveness ?? 'alive' },
      verdict: report.verdict,
      report,
      started_at: run.startedAt,
      finished_at: run.finishedAt,
    });
    return report;
  }

  async findRecent(limit = 100): Promise<RunReport[]> {
    const rows = await this.repo.find({ order: { created_at: 'DESC' }, take: limit });
    return rows.map((row) => row.report);
  }

  async findOne(id: string): Promise<RunReport | null> {
    const row = await this.repo.findOne({ where: { id } });
    return row?.report ?? null;
  }
}
