import { RunEvent, RunEventsService } from './run-events.service';

describe('RunEventsService', () => {
  it('delivers only the subscribed run to a per-run stream', () => {
    const events = new RunEventsService();
    const seen: RunEvent[] = [];
    events.streamForRun('run-1').subscribe((ev) => seen.push(ev));

    events.emit('run-2', 'run.started', 'app:1 -> {fleet=db} (alive)');
    events.emit('run-1', 'stage.started', 'attempt 1 on i-0a', 'DependencyCheck');

    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject({
      run_id: 'run-1',
      type: 'stage.started',
      stage: 'DependencyCheck',
      detail: 'attempt 1 on i-0a',
    });
  });

  it('completes every stream on shutdown', () => {
    const events = new RunEventsService();
    let completed = false;
    events.stream().subscribe({ complete: () => (completed = true) });

    events.onModuleDestroy();

    expect(completed).toBe(true);
  });
});
