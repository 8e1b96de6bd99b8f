import { ChildProcess } from 'child_process';
import { PassThrough } from 'stream';
import {
  HookProcessHandle,
  HookRunStatus,
  HookScripts,
  LifecycleSupervisor,
  MAX_TIMER_DELAY_MS,
  ProcessLauncher,
  createHookDescriptor,
  describeExit,
} from '../../src';

describe('LifecycleSupervisor', () => {
  const logger = {
    log: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  };
  let launcher: ProcessLauncher;
  let supervisor: LifecycleSupervisor;

  beforeEach(() => {
    jest.clearAllMocks();
    launcher = new ProcessLauncher(logger);
    supervisor = new LifecycleSupervisor(logger);
  });

  it('should report a process that exits before its timeout', async () => {
    const handle = await launcher.launch(createHookDescriptor(HookScripts.exitWith('/quick', 2)));
    await handle.closeInput();

    const report = await supervisor.supervise(handle, 60, '/quick');

    expect(report.status).toBe(HookRunStatus.EXITED);
    expect(report.exit).toEqual({ code: 2, signal: null });
    expect(report.durationMs).toBeLessThan(60000);
    expect(logger.log).toHaveBeenCalledWith('Hook /quick exited. exit status: 2');
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should wait without limit when the timeout is zero', async () => {
    const handle = await launcher.launch(
      createHookDescriptor({
        path: '/slow',
        program: process.execPath,
        args: ['-e', 'setTimeout(() => process.exit(0), 1500)'],
      }),
    );
    await handle.closeInput();

    const report = await supervisor.supervise(handle, 0, '/slow');

    expect(report.status).toBe(HookRunStatus.EXITED);
    expect(report.exit).toEqual({ code: 0, signal: null });
    expect(report.durationMs).toBeGreaterThanOrEqual(1000);
  });

  it('should kill a process that outlives its timeout', async () => {
    const handle = await launcher.launch(createHookDescriptor(HookScripts.hang('/hang')));

    const report = await supervisor.supervise(handle, 1, '/hang');

    expect(report.status).toBe(HookRunStatus.TIMED_OUT);
    expect(report.exit).toEqual({ code: null, signal: 'SIGKILL' });
    expect(report.durationMs).toBeGreaterThanOrEqual(900);
    expect(handle.hasExited()).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith('Timed out waiting for hook /hang after 1s; killing it');
  });

  it('should use the pid as label by default', async () => {
    const handle = await launcher.launch(createHookDescriptor(HookScripts.exitWith('/pid', 0)));

    await supervisor.supervise(handle, 5);

    expect(logger.log).toHaveBeenCalledWith(`Hook pid ${handle.pid} exited. exit status: 0`);
  });

  it('should honour a timeout longer than a single timer allows', async () => {
    const handle = await launcher.launch(createHookDescriptor(HookScripts.hang('/month')));

    const supervision = supervisor.supervise(handle, 30 * 24 * 60 * 60, '/month');
    await new Promise((resolve) => setTimeout(resolve, 200));

    expect(handle.hasExited()).toBe(false);
    expect(logger.warn).not.toHaveBeenCalled();

    handle.kill('SIGKILL');
    const report = await supervision;

    expect(report.status).toBe(HookRunStatus.EXITED);
    expect(report.exit).toEqual({ code: null, signal: 'SIGKILL' });
  });

  describe('with simulated processes', () => {
    let child: ChildProcess;
    let handle: HookProcessHandle;

    beforeEach(() => {
      jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate'] });
      child = new ChildProcess();
      handle = new HookProcessHandle(child, new PassThrough(), 'simulated', logger);
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it('should report an exit observed when the timer fires as exited, not kill it', async () => {
      const kill = jest.spyOn(handle, 'kill');

      const supervision = supervisor.supervise(handle, 1, '/tie');
      child.emit('exit', 0, null);
      jest.advanceTimersByTime(1000);
      const report = await supervision;

      expect(report.status).toBe(HookRunStatus.EXITED);
      expect(report.exit).toEqual({ code: 0, signal: null });
      expect(report.durationMs).toBe(1000);
      expect(kill).not.toHaveBeenCalled();
      expect(logger.warn).not.toHaveBeenCalled();
      expect(logger.log).toHaveBeenCalledWith('Hook /tie exited. exit status: 0');
    });

    it('should chain timers until the whole timeout has elapsed', async () => {
      const kill = jest.spyOn(handle, 'kill').mockImplementation(() => {
        child.emit('exit', null, 'SIGKILL');
        return true;
      });
      const timeoutSeconds = 30 * 24 * 60 * 60;

      const supervision = supervisor.supervise(handle, timeoutSeconds, '/month');
      jest.advanceTimersByTime(MAX_TIMER_DELAY_MS);

      expect(kill).not.toHaveBeenCalled();

      jest.advanceTimersByTime(timeoutSeconds * 1000 - MAX_TIMER_DELAY_MS);
      const report = await supervision;

      expect(kill).toHaveBeenCalledWith('SIGKILL');
      expect(report.status).toBe(HookRunStatus.TIMED_OUT);
      expect(report.exit).toEqual({ code: null, signal: 'SIGKILL' });
      expect(logger.warn).toHaveBeenCalledWith(
        `Timed out waiting for hook /month after ${timeoutSeconds}s; killing it`,
      );
    });
  });

  describe('describeExit', () => {
    it('should describe exit codes and signals', () => {
      expect(describeExit({ code: 0, signal: null })).toBe('exit status: 0');
      expect(describeExit({ code: null, signal: 'SIGTERM' })).toBe('terminated by signal SIGTERM');
    });
  });
});
