import { ExtractionMachine, canTransition } from '../../agents/extractionMachine';
import type { MachineState } from '../../agents/extractionMachine';
import { SessionManager } from '../../agents/sessionManager';
import { JobCancelled, LayoutChanged, NavigationTimeout, SessionExpired } from '../../core/errors';
import type { PipelineError } from '../../core/errors';
import type { Credential } from '../../core/types';
import { FakePortalDriver, SAMPLE_PROFILE } from '../../test/fakes';
import type { FakePortalScript } from '../../test/fakes';

const credential: Credential = { ref: 'teacher-a', username: 'teacher01', secret: 'test-secret' };
const target = { classId: '411', period: '2', locale: 'ru' as const };
const options = { stepBudgetMs: 1_000, startYear: 2025 };

function setup(script: FakePortalScript = {}, stepBudgetMs = options.stepBudgetMs) {
  const driver = new FakePortalDriver(script);
  const sessions = new SessionManager(driver, { loginAttempts: 1 });
  const transitions: string[] = [];
  const recovered: PipelineError[] = [];
  let cancelled = false;

  const machine = new ExtractionMachine(sessions, credential, target, { ...options, stepBudgetMs }, {
    onTransition: (from, to) => transitions.push(`${from}>${to}`),
    onRecovered: (err) => recovered.push(err),
    isCancelled: () => cancelled,
  });
  return {
    driver,
    sessions,
    machine,
    transitions,
    recovered,
    cancel: () => {
      cancelled = true;
    },
  };
}

describe('transition table', () => {
  it('allows the happy path and retries, nothing out of terminal states', () => {
    const path: MachineState[] = ['Init', 'Authenticating', 'Navigating', 'SelectingPeriod', 'ExtractingTable', 'Parsing', 'Completed'];
    for (let i = 1; i < path.length; i++) {
      expect(canTransition(path[i - 1], path[i])).toBe(true);
    }
    expect(canTransition('ExtractingTable', 'Retrying')).toBe(true);
    expect(canTransition('Retrying', 'Navigating')).toBe(true);
    expect(canTransition('Retrying', 'Parsing')).toBe(false);
    expect(canTransition('Completed', 'Failed')).toBe(false);
    expect(canTransition('Failed', 'Retrying')).toBe(false);
  });
});

describe('ExtractionMachine', () => {
  it('walks every step and returns the validated table', async () => {
    const { machine, transitions, sessions } = setup();
    const result = await machine.run();

    expect(transitions).toEqual([
      'Init>Authenticating',
      'Authenticating>Navigating',
      'Navigating>SelectingPeriod',
      'SelectingPeriod>ExtractingTable',
      'ExtractingTable>Parsing',
      'Parsing>Completed',
    ]);
    expect(machine.state).toBe('Completed');
    expect(result.rows).toHaveLength(3);
    expect(result.context).toEqual({
      className: '5В',
      subject: 'Математика',
      schoolName: SAMPLE_PROFILE.schoolName,
      teacherName: SAMPLE_PROFILE.teacherName,
      periodLabel: '2 четверть',
    });
    expect(sessions.stats().liveSessions).toBe(1);
  });

  it('renews the session once and resumes from navigation', async () => {
    const { machine, transitions, recovered, driver } = setup({ expireAt: 'readTable', expiries: 1 });
    await machine.run();

    expect(recovered).toHaveLength(1);
    expect(recovered[0]).toBeInstanceOf(SessionExpired);
    expect(transitions).toContain('ExtractingTable>Retrying');
    expect(transitions).toContain('Retrying>Navigating');
    expect(transitions[transitions.length - 1]).toBe('Parsing>Completed');
    expect(driver.loginCalls).toBe(2);
    expect(driver.openedClasses).toEqual(['411', '411']);
  });

  it('fails on a second expiry in the same run and drops the session', async () => {
    const { machine, sessions, driver } = setup({ expireAt: 'selectPeriod', expiries: 2 });

    await expect(machine.run()).rejects.toBeInstanceOf(SessionExpired);
    expect(machine.state).toBe('Failed');
    expect(sessions.stats().liveSessions).toBe(0);
    expect(driver.contextsClosed).toBe(1);
  });

  it('times out a step that never settles and frees the credential', async () => {
    const { machine, sessions, driver } = setup({ hangAt: 'readTable' }, 25);

    let caught: unknown;
    try {
      await machine.run();
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(NavigationTimeout);
    expect(caught instanceof Error ? caught.message : '').toBe('ExtractingTable did not finish within 25 ms');
    expect(machine.state).toBe('Failed');
    expect(sessions.stats().liveSessions).toBe(0);
    expect(driver.contextsClosed).toBe(1);

    const next = await sessions.acquire(credential, 'ru');
    expect(next.valid).toBe(true);
    expect(driver.loginCalls).toBe(2);
    sessions.release(next);
  });

  it('attaches a page snapshot to a layout change', async () => {
    const { machine } = setup({ table: { headers: ['Имя', 'Комментарий'], rows: [] } });

    let caught: unknown;
    try {
      await machine.run();
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(LayoutChanged);
    if (!(caught instanceof LayoutChanged)) return;
    expect(caught.snapshot?.step).toBe('Parsing');
    expect(caught.snapshot?.url).toBe('https://portal.test/journal');
  });

  it('stops at the next step once cancelled, without failing', async () => {
    const { machine, cancel, transitions, sessions } = setup();
    cancel();

    await expect(machine.run()).rejects.toBeInstanceOf(JobCancelled);
    expect(transitions).toEqual([]);
    expect(machine.state).toBe('Init');
    expect(sessions.stats().loginCalls).toBe(0);
  });

  it('runs only once', async () => {
    const { machine } = setup();
    await machine.run();
    await expect(machine.run()).rejects.toThrow('Extraction machine already ran (state Completed)');
  });
});
