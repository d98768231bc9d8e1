/**
 * @fileoverview Integration tests for the HTTP API
 * Covers routing, error mapping, access control and the camera endpoints
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as http from 'http';
import type { AddressInfo } from 'net';
import request from 'supertest';
import type { Application } from 'express';
import { createApp, WebUIManager } from './WebUIManager';
import { getConfigManager } from '../../managers/ConfigManager';
import { PrinterRegistry } from '../../managers/PrinterRegistry';
import { AppConfigSchema } from '../../types/config';
import { StubPrinterClient, stubStatus } from '../../__tests__/fakes/StubPrinterClient';
import { FakeCameraServer, FAKE_BOUNDARY, waitFor } from '../../__tests__/fakes/FakeCameraServer';
import { findClosedPort } from '../../__tests__/fakes/FakePrinterServer';
import type { RouteDependencies } from './routes/route-helpers';

describe('HTTP API', () => {
  let registry: PrinterRegistry;
  let stubs: Map<string, StubPrinterClient>;
  let deps: RouteDependencies;
  let app: Application;

  function stub(id: string): StubPrinterClient {
    const found = stubs.get(id);
    if (!found) {
      throw new Error(`no stub ${id}`);
    }
    return found;
  }

  function useAuth(auth: { passwordForRead?: boolean; passwordForWrite?: boolean; password?: string }): void {
    getConfigManager().setConfig(AppConfigSchema.parse({ auth }));
  }

  beforeEach(async () => {
    stubs = new Map();
    registry = new PrinterRegistry({
      createClient: (id, address) => {
        const created = new StubPrinterClient(id, address.host, address.cameraPort);
        stubs.set(id, created);
        return created;
      }
    });
    await registry.addPrinter('bay-1', { host: '127.0.0.1', port: 8899, cameraPort: await findClosedPort() });
    await registry.addPrinter('bay-2', { host: '127.0.0.2', port: 8899, cameraPort: 8080 });

    useAuth({});
    deps = { registry, configManager: getConfigManager(), startedAt: new Date() };
    app = createApp(deps);
  });

  afterEach(async () => {
    await registry.shutdown();
    getConfigManager().dispose();
  });

  describe('printer routes', () => {
    it('should report health with the printer count', async () => {
      const response = await request(app).get('/api/health');

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(response.body.data.status).toBe('ok');
      expect(response.body.data.printerCount).toBe(2);
    });

    it('should list printer summaries from cached state', async () => {
      stub('bay-1').file = 'bracket.gx';
      stub('bay-2').reachable = false;

      const response = await request(app).get('/api/printers');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        data: [
          {
            id: 'bay-1',
            name: 'Stub Printer',
            address: '127.0.0.1',
            online: true,
            currentFile: 'bracket.gx',
            firmwareVersion: 'v1.3.7'
          },
          {
            id: 'bay-2',
            name: 'Stub Printer',
            address: '127.0.0.2',
            online: false,
            currentFile: null,
            firmwareVersion: 'v1.3.7'
          }
        ]
      });
    });

    it('should list printer ids', async () => {
      const response = await request(app).get('/api/printers/names');

      expect(response.body).toEqual({ success: true, data: ['bay-1', 'bay-2'] });
    });

    it('should return the live status of a printer', async () => {
      stub('bay-1').file = 'bracket.gx';

      const response = await request(app).get('/api/printers/bay-1/status');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ success: true, data: stubStatus('bracket.gx') });
    });

    it('should answer 404 with UNKNOWN_PRINTER for an unknown id', async () => {
      const response = await request(app).get('/api/printers/bay-9/status');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ success: false, error: 'unknown printer bay-9', code: 'UNKNOWN_PRINTER' });
    });

    it('should answer 500 with the error code when the printer is unreachable', async () => {
      stub('bay-1').reachable = false;

      const response = await request(app).get('/api/printers/bay-1/status');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        success: false,
        error: 'Printer unreachable or offline',
        code: 'PRINTER_OFFLINE'
      });
    });

    it('should set a tool temperature', async () => {
      const response = await request(app)
        .post('/api/printers/bay-1/temperature')
        .send({ toolIndex: 0, temperature: 210 });

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(stub('bay-1').temperatureRequests).toEqual([{ toolIndex: 0, temperature: 210 }]);
    });

    it('should reject an out-of-range temperature with 400', async () => {
      const response = await request(app)
        .post('/api/printers/bay-1/temperature')
        .send({ toolIndex: 0, temperature: 400 });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION');
      expect(stub('bay-1').temperatureRequests).toEqual([]);
    });

    it('should answer unknown API paths with a JSON 404', async () => {
      const response = await request(app).get('/api/nothing-here');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        success: false,
        error: 'No route for GET /api/nothing-here',
        code: 'NOT_FOUND'
      });
    });
  });

  describe('access control', () => {
    it('should require the secret for reads when configured', async () => {
      useAuth({ passwordForRead: true, password: 'test-secret' });

      const missing = await request(app).get('/api/printers');
      const wrong = await request(app).get('/api/printers').set('x-secret', 'not-the-secret');
      const right = await request(app).get('/api/printers').set('x-secret', 'test-secret');

      expect(missing.status).toBe(401);
      expect(missing.body).toEqual({ success: false, error: 'Missing secret', code: 'AUTH_REQUIRED' });
      expect(wrong.status).toBe(401);
      expect(wrong.body.error).toBe('Invalid secret');
      expect(right.status).toBe(200);
    });

    it('should guard writes separately from reads', async () => {
      useAuth({ passwordForWrite: true, password: 'test-secret' });

      const read = await request(app).get('/api/printers');
      const write = await request(app)
        .post('/api/printers/bay-1/temperature')
        .send({ toolIndex: 0, temperature: 200 });

      expect(read.status).toBe(200);
      expect(write.status).toBe(401);
    });

    it('should reject every protected request when the password is empty', async () => {
      useAuth({ passwordForRead: true, password: '' });

      const response = await request(app).get('/api/printers').set('x-secret', '');

      expect(response.status).toBe(401);
    });
  });

  describe('camera routes', () => {
    let camera: FakeCameraServer;

    beforeEach(async () => {
      camera = new FakeCameraServer();
      const cameraPort = await camera.start();
      await registry.addPrinter('bay-3', { host: '127.0.0.1', port: 8899, cameraPort });
    });

    afterEach(async () => {
      await registry.shutdown();
      await camera.stop();
    });

    it('should return a live frame as image/jpeg', async () => {
      const frame = Buffer.from([0xff, 0xd8, 0x01, 0x02, 0xff, 0xd9]);
      const pending = request(app).get('/api/printers/bay-3/camera/snapshot').then(response => response);

      await waitFor(() => camera.openStreamCount === 1);
      camera.sendFrame(frame);
      const response = await pending;

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe('image/jpeg');
      expect(Buffer.compare(response.body, frame)).toBe(0);
    });

    it('should answer 503 when the camera cannot be reached', async () => {
      const response = await request(app).get('/api/printers/bay-1/camera/snapshot');

      expect(response.status).toBe(503);
      expect(response.body.code).toBe('CAMERA_UNAVAILABLE');
    });

    it('should answer 503 when no frame arrives in time', async () => {
      const response = await request(app).get('/api/printers/bay-3/camera/snapshot?timeoutMs=150');

      expect(response.status).toBe(503);
      expect(response.body.code).toBe('TIMEOUT');
    });

    it('should report camera status', async () => {
      const response = await request(app).get('/api/printers/bay-3/camera/status');

      expect(response.status).toBe(200);
      expect(response.body.data.printerId).toBe('bay-3');
      expect(response.body.data.streaming).toBe(false);
      expect(response.body.data.subscriberCount).toBe(0);
    });

    it('should re-broadcast frames as multipart parts', async () => {
      const server = http.createServer(app);
      await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
      const address: AddressInfo | string | null = server.address();
      if (address === null || typeof address === 'string') {
        throw new Error('server did not bind a TCP port');
      }
      const port = address.port;

      try {
        const chunks: Buffer[] = [];
        let contentType = '';
        const finished = new Promise<void>((resolve, reject) => {
          http.get({ hostname: '127.0.0.1', port, path: '/api/printers/bay-3/camera/stream', agent: false }, (res) => {
            contentType = res.headers['content-type'] ?? '';
            res.on('data', (chunk: Buffer) => chunks.push(chunk));
            res.on('end', () => resolve());
            res.on('error', reject);
          }).on('error', reject);
        });

        const frame = Buffer.from([0xff, 0xd8, 0xff, 0xd9]);
        await waitFor(() => camera.openStreamCount === 1);
        camera.sendFrame(frame);
        await waitFor(() => chunks.length > 0);
        camera.endStreams();
        await finished;

        expect(contentType).toBe(`multipart/x-mixed-replace; boundary=${FAKE_BOUNDARY}`);
        expect(Buffer.concat(chunks)).toEqual(Buffer.concat([
          Buffer.from(`--${FAKE_BOUNDARY}\r\nContent-Type: image/jpeg\r\nContent-Length: 4\r\n\r\n`),
          frame,
          Buffer.from('\r\n')
        ]));
      } finally {
        server.closeAllConnections();
        await new Promise<void>(resolve => server.close(() => resolve()));
      }
    });
  });
});

describe('WebUIManager', () => {
  afterEach(() => {
    getConfigManager().dispose();
  });

  it('should start on a free port and stop', async () => {
    const manager = new WebUIManager({
      registry: new PrinterRegistry(),
      configManager: getConfigManager(),
      startedAt: new Date()
    });

    const status = await manager.start({ host: '127.0.0.1', port: 0 });
    expect(status.isRunning).toBe(true);
    expect(status.port).toBeGreaterThan(0);

    const response = await request(`http://127.0.0.1:${status.port}`).get('/api/printers/names');
    expect(response.body).toEqual({ success: true, data: [] });

    await manager.stop();
    expect(manager.isServerRunning()).toBe(false);
  });
});
