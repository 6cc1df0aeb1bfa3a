import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { Observable, Subject } from 'rxjs';
import { filter } from 'rxjs/operators';

export type RunEventType = 'run.started' | 'stage.started' | 'stage.finished' | 'run.finished';

export interface RunEvent {
  run_id: string;
  type: RunEventType;
  stage: string | null;
  detail: string;
  timestamp: string;
}

/**
 * In-process progress feed for running deployments. Nothing is stored; late subscribers
 * only see events from the moment they subscribe.
 */
@Injectable()
export class RunEventsService implements OnModuleDestroy {
  private readonly events = new Subject<RunEvent>();

  emit(runId: string, type: RunEventType, detail: string, stage: string | null = null): void {
    this.events.next({
      run_id: runId,
      type,
      stage,
      detail,
      timestamp: new Date().toISOString(),
    });
  }

  stream(): Observable<RunEvent> {
    return this.events.asObservable();
  }

  streamForRun(runId: string): Observable<RunEvent> {
    return this.events.pipe(filter((ev) => ev.run_id === runId));
  }

  onModuleDestroy(): void {
    this.events.complete();
  }
}
