import request from 'supertest';
import { Application } from 'express';
import { sign } from 'jsonwebtoken';
import { createApp } from '../../src/app';
import { DeviceProvider } from '../../src/models/device.model';
import { ProviderTransportError } from '../../src/utils/errors';
import {
  createFakeApnsClient,
  createFakeGcmClient,
  FakeApnsClient,
  InMemoryDeviceRepository,
  InMemoryNotificationLog,
  objectIdFor,
} from '../helpers/inMemoryStores';

const SECRET = 'test-secret';
const USER_A = objectIdFor(100);
const USER_B = objectIdFor(101);

describe('Device API Integration Tests', () => {
  let app: Application;
  let devices: InMemoryDeviceRepository;
  let apns: FakeApnsClient;
  let userAToken: string;
  let userBToken: string;
  let serviceToken: string;

  beforeEach(() => {
    devices = new InMemoryDeviceRepository();
    apns = createFakeApnsClient();
    app = createApp({
      devices,
      notifications: new InMemoryNotificationLog(),
      apns,
      gcm: createFakeGcmClient(),
      accessTokenSecret: SECRET,
    });

    userAToken = sign({ sub: USER_A, role: 'user' }, SECRET);
    userBToken = sign({ sub: USER_B, role: 'user' }, SECRET);
    serviceToken = sign({ sub: objectIdFor(200), role: 'service' }, SECRET);
  });

  describe('POST /devices/apns and /devices/gcm', () => {
    it('should register an APNS device for the caller (201 Created)', async () => {
      // Act
      const response = await request(app)
        .post('/devices/apns')
        .set('Authorization', `Bearer ${userAToken}`)
        .send({ registrationId: 'a1b2c3', deviceId: 'iphone-1', name: 'Work phone' });

      // Assert
      expect(response.status).toBe(201);
      expect(response.body).toEqual({
        id: objectIdFor(1),
        name: 'Work phone',
        active: true,
        owner: USER_A,
        createdAt: '2026-01-01T00:00:00.000Z',
        deviceId: 'iphone-1',
        registrationId: 'a1b2c3',
        provider: DeviceProvider.APNS,
      });
    });

    it('should tag a device registered through /devices/gcm as GCM', async () => {
      // Act
      const response = await request(app)
        .post('/devices/gcm')
        .set('Authorization', `Bearer ${userAToken}`)
        .send({ registrationId: 'gcm-reg-1' });

      // Assert
      expect(response.status).toBe(201);
      expect(response.body.provider).toBe(DeviceProvider.GCM);
    });

    it('should re-register a known hardware id in place', async () => {
      // Arrange
      await request(app)
        .post('/devices/apns')
        .set('Authorization', `Bearer ${userAToken}`)
        .send({ registrationId: 'old-token', deviceId: 'iphone-1' });

      // Act
      const response = await request(app)
        .post('/devices/apns')
        .set('Authorization', `Bearer ${userAToken}`)
        .send({ registrationId: 'new-token', deviceId: 'iphone-1' });

      // Assert
      expect(response.status).toBe(201);
      expect(response.body.id).toBe(objectIdFor(1));
      expect(response.body.registrationId).toBe('new-token');
      expect(devices.all()).toHaveLength(1);
    });

    it('should return 409 when the hardware id is registered under the other provider', async () => {
      // Arrange
      await request(app)
        .post('/devices/apns')
        .set('Authorization', `Bearer ${userAToken}`)
        .send({ registrationId: 'apns-token', deviceId: 'shared-hw' });

      // Act
      const response = await request(app)
        .post('/devices/gcm')
        .set('Authorization', `Bearer ${userAToken}`)
        .send({ registrationId: 'gcm-token', deviceId: 'shared-hw' });

      // Assert
      expect(response.status).toBe(409);
      expect(response.body.error.code).toBe('conflict');
    });

    it('should return 422 when the body tries to set the provider', async () => {
      // Act
      const response = await request(app)
        .post('/devices/apns')
        .set('Authorization', `Bearer ${userAToken}`)
        .send({ registrationId: 'a1b2c3', provider: 1 });

      // Assert
      expect(response.status).toBe(422);
      expect(response.body.error.code).toBe('validation_error');
      expect(response.body.error.details).toEqual([
        { field: 'provider', reason: 'Provider is set by the endpoint and cannot be supplied.', value: 1 },
      ]);
    });

    it('should return 422 without a registration id', async () => {
      // Act
      const response = await request(app)
        .post('/devices/gcm')
        .set('Authorization', `Bearer ${userAToken}`)
        .send({ name: 'Tablet' });

      // Assert
      expect(response.status).toBe(422);
      expect(response.body.error.details[0].field).toBe('registrationId');
    });

    it('should return 401 without a token', async () => {
      // Act
      const response = await request(app).post('/devices/apns').send({ registrationId: 'a1b2c3' });

      // Assert
      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe('no_token');
    });

    it('should return 403 for a service caller', async () => {
      // Act
      const response = await request(app)
        .post('/devices/apns')
        .set('Authorization', `Bearer ${serviceToken}`)
        .send({ registrationId: 'a1b2c3' });

      // Assert
      expect(response.status).toBe(403);
    });
  });

  describe('GET /devices', () => {
    it("should list only the caller's devices", async () => {
      // Arrange
      devices.seed({ registrationId: 'a-1', provider: DeviceProvider.APNS, owner: USER_A });
      devices.seed({ registrationId: 'g-1', provider: DeviceProvider.GCM, owner: USER_A });
      devices.seed({ registrationId: 'b-1', provider: DeviceProvider.GCM, owner: USER_B });

      // Act
      const response = await request(app).get('/devices').set('Authorization', `Bearer ${userAToken}`);

      // Assert
      expect(response.status).toBe(200);
      expect(response.body.data.map((d: { registrationId: string }) => d.registrationId)).toEqual(['a-1', 'g-1']);
    });
  });

  describe('PATCH /devices/:id', () => {
    it('should rename and deactivate an owned device', async () => {
      // Arrange
      const device = devices.seed({ registrationId: 'a-1', provider: DeviceProvider.APNS, owner: USER_A });

      // Act
      const response = await request(app)
        .patch(`/devices/${device.id}`)
        .set('Authorization', `Bearer ${userAToken}`)
        .send({ name: 'Old phone', active: false });

      // Assert
      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ id: device.id, name: 'Old phone', active: false });
    });

    it("should return 404 for another owner's device", async () => {
      // Arrange
      const device = devices.seed({ registrationId: 'a-1', provider: DeviceProvider.APNS, owner: USER_A });

      // Act
      const response = await request(app)
        .patch(`/devices/${device.id}`)
        .set('Authorization', `Bearer ${userBToken}`)
        .send({ name: 'Mine now' });

      // Assert
      expect(response.status).toBe(404);
      expect(response.body.error.message).toBe('Device not found');
      expect(device.name).toBeUndefined();
    });

    it('should return 422 for an id that is not a Mongo id', async () => {
      // Act
      const response = await request(app)
        .patch('/devices/not-an-id')
        .set('Authorization', `Bearer ${userAToken}`)
        .send({ name: 'x' });

      // Assert
      expect(response.status).toBe(422);
    });
  });

  describe('POST /devices/expired/deactivate', () => {
    it('should deactivate devices reported by the feedback service', async () => {
      // Arrange
      const dead = devices.seed({ registrationId: 'deadbeef', provider: DeviceProvider.APNS });
      apns.fetchInactiveIds.mockResolvedValueOnce(['deadbeef', 'unknown-token']);

      // Act
      const response = await request(app)
        .post('/devices/expired/deactivate')
        .set('Authorization', `Bearer ${serviceToken}`)
        .send({});

      // Assert
      expect(response.status).toBe(200);
      expect(response.body).toEqual({ expiredCount: 2, deactivated: 1 });
      expect(dead.active).toBe(false);
    });

    it('should return 502 when the feedback service cannot be reached', async () => {
      // Arrange
      apns.fetchInactiveIds.mockRejectedValueOnce(new ProviderTransportError('apns', 'Feedback service: ECONNREFUSED'));

      // Act
      const response = await request(app)
        .post('/devices/expired/deactivate')
        .set('Authorization', `Bearer ${serviceToken}`)
        .send({ credentialFile: '/etc/push/apns.pem' });

      // Assert
      expect(response.status).toBe(502);
      expect(response.body.error.message).toBe('ProviderTransport(apns): Feedback service: ECONNREFUSED');
      expect(apns.fetchInactiveIds).toHaveBeenCalledWith('/etc/push/apns.pem');
    });

    it('should return 403 for a regular user', async () => {
      // Act
      const response = await request(app)
        .post('/devices/expired/deactivate')
        .set('Authorization', `Bearer ${userAToken}`)
        .send({});

      // Assert
      expect(response.status).toBe(403);
    });
  });
});
