/**
 * Tor Controller Tests
 */

import { TorStartError } from '../../errors';
import { HealthResult, ProxyProtocol } from '../../proxy';
import { RotatorState } from '../../state';
import { TorController, TorStatus } from '..';
import { FakeTorLauncher, createMockHealthChecker, startTorControlStub, waitFor } from '../../../__tests__/helpers/mocks';
import { testTorConfig } from '../../../__tests__/helpers/fixtures';

describe('TorController', () => {
  let state: RotatorState;
  let launcher: FakeTorLauncher;
  let healthChecker: ReturnType<typeof createMockHealthChecker>;

  const createController = (controlPort: number = testTorConfig.controlPort) =>
    new TorController({
      config: { ...testTorConfig, controlPort },
      state,
      healthChecker,
      launcher,
    });

  beforeEach(() => {
    state = new RotatorState();
    launcher = new FakeTorLauncher();
    healthChecker = createMockHealthChecker({
      '127.0.0.1:9050': { working: true, observedIp: '198.51.100.20', latencyMs: 300 },
    });
  });

  it('should synthesize the local SOCKS egress record', () => {
    expect(createController().egressRecord()).toEqual({
      host: '127.0.0.1',
      port: 9050,
      protocol: ProxyProtocol.SOCKS5,
      country: 'TOR',
      isFavorite: false,
    });
  });

  describe('process lifecycle', () => {
    it('should launch Tor with the configured ports', async () => {
      const controller = createController();

      await controller.startProcess();

      expect(launcher.launches).toEqual([
        { executable: 'tor', args: ['--SocksPort', '9050', '--ControlPort', '9051'] },
      ]);
      expect(launcher.installs).toEqual([]);
      expect(controller.getStatus()).toBe(TorStatus.RUNNING);
      expect(state.getTor()).toMatchObject({ processRunning: true, processId: 4242 });
    });

    it('should install Tor first when it is missing', async () => {
      launcher.installed = false;

      await createController().startProcess();

      expect(launcher.installs).toEqual(['install-tor']);
      expect(launcher.launches).toHaveLength(1);
    });

    it('should fail when the process dies during startup', async () => {
      launcher.process.alive = false;
      const controller = createController();

      await expect(controller.startProcess()).rejects.toThrow('Tor exited during startup');
      expect(controller.getStatus()).toBe(TorStatus.STOPPED);
      expect(state.getTor().processRunning).toBe(false);
    });

    it('should wrap install failures in TorStartError', async () => {
      launcher.installed = false;
      jest.spyOn(launcher, 'install').mockRejectedValueOnce(new Error('no package manager'));

      const error = await createController().startProcess().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TorStartError);
      expect(error).toMatchObject({ message: 'Failed to start Tor: no package manager' });
      expect(launcher.launches).toEqual([]);
    });

    it('should terminate gracefully', async () => {
      const controller = createController();
      await controller.startProcess();

      await controller.stopProcess();

      expect(launcher.process.signals).toEqual(['SIGTERM']);
      expect(state.getTor().processRunning).toBe(false);
    });

    it('should force-kill a process that ignores SIGTERM', async () => {
      launcher.process.exitsOnTerm = false;
      const controller = createController();
      await controller.startProcess();

      await controller.stopProcess();

      expect(launcher.process.signals).toEqual(['SIGTERM', 'SIGKILL']);
    });

    it('should be safe to stop twice', async () => {
      const controller = createController();
      await controller.startProcess();

      await controller.stopProcess();
      await controller.stopProcess();

      expect(launcher.process.signals).toEqual(['SIGTERM']);
      expect(controller.getStatus()).toBe(TorStatus.STOPPED);
    });
  });

  describe('circuit rotation', () => {
    it('should renew circuits on an interval and probe the new exit', async () => {
      const stub = await startTorControlStub({ 'AUTHENTICATE': '250 OK', 'signal NEWNYM': '250 OK' });
      const controller = createController(stub.port);
      try {
        expect(controller.startRotation(0.01)).toBe(true);
        expect(controller.startRotation(0.01)).toBe(false);
        expect(state.getTor()).toMatchObject({ rotationActive: true, rotationIntervalSeconds: 0.01 });

        await waitFor(() => stub.received.filter(command => command === 'signal NEWNYM').length >= 2);
        expect(await controller.stopRotation()).toBe(true);

        expect(controller.isRotating()).toBe(false);
        expect(state.getTor().rotationActive).toBe(false);
        expect(healthChecker.test).toHaveBeenCalledWith(controller.egressRecord(), undefined);
      } finally {
        await stub.close();
      }
    });

    it('should keep rotating after a rejected authentication', async () => {
      const stub = await startTorControlStub({ 'AUTHENTICATE': '515 Authentication failed' });
      const controller = createController(stub.port);
      try {
        controller.startRotation(0.01);

        await waitFor(() => stub.received.length >= 2);
        await controller.stopRotation();

        expect(stub.received.every(command => command === 'AUTHENTICATE')).toBe(true);
        expect(healthChecker.test).not.toHaveBeenCalled();
      } finally {
        await stub.close();
      }
    });

    it('should refuse a non-positive interval', () => {
      const controller = createController();

      expect(controller.startRotation(0)).toBe(false);
      expect(controller.startRotation(-5)).toBe(false);
      expect(controller.isRotating()).toBe(false);
      expect(state.getTor().rotationActive).toBe(false);
    });

    it('should stop without waiting for a renewal that never settles', async () => {
      const stub = await startTorControlStub({ 'AUTHENTICATE': '250 OK', 'signal NEWNYM': '250 OK' });
      healthChecker.test.mockImplementation(() => new Promise<HealthResult>(() => undefined));
      const controller = new TorController({
        config: { ...testTorConfig, controlPort: stub.port },
        state,
        healthChecker,
        launcher,
        joinTimeoutMs: 20,
      });
      try {
        controller.startRotation(60);
        await waitFor(() => healthChecker.test.mock.calls.length === 1);

        expect(await controller.stopRotation()).toBe(true);
        expect(controller.isRotating()).toBe(false);
        expect(state.getTor().rotationActive).toBe(false);
      } finally {
        await stub.close();
      }
    });

    it('should report stopRotation without a running loop', async () => {
      expect(await createController().stopRotation()).toBe(false);
    });
  });
});
