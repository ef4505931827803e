import { ApnsConfig } from '../../src/config/env';
import {
  APNS_MAX_PAYLOAD_BYTES,
  APNSAdapter,
  buildApnsHeaders,
  buildApnsPayload,
  parseFeedbackFrames,
} from '../../src/notificationAdapters/apns.adapter';
import { ProviderTransportError } from '../../src/utils/errors';

const config: ApnsConfig = {
  host: 'apns.test',
  port: 443,
  feedbackHost: 'feedback.test',
  feedbackPort: 2196,
  timeoutMs: 10000,
  maxConcurrentStreams: 100,
};

function feedbackFrame(timestamp: number, token: Buffer): Buffer {
  const header = Buffer.alloc(6);
  header.writeUInt32BE(timestamp, 0);
  header.writeUInt16BE(token.length, 4);
  return Buffer.concat([header, token]);
}

describe('APNS Adapter Unit Tests', () => {
  describe('buildApnsPayload', () => {
    it('should put the alert and APNS options under aps and extra keys beside it', () => {
      // Act
      const payload = buildApnsPayload('Your order shipped', {
        extra: { orderId: 7 },
        badge: 1,
        sound: 'default',
        category: 'ORDER',
        contentAvailable: true,
      });

      // Assert
      expect(payload).toEqual({
        orderId: 7,
        aps: { alert: 'Your order shipped', badge: 1, sound: 'default', category: 'ORDER', 'content-available': 1 },
      });
    });

    it('should send only the alert when no options are given', () => {
      expect(buildApnsPayload('hi', {})).toEqual({ aps: { alert: 'hi' } });
    });

    it('should reject a payload over the size limit', () => {
      // Arrange
      const alert = 'x'.repeat(APNS_MAX_PAYLOAD_BYTES);

      // Act & Assert
      expect(() => buildApnsPayload(alert, {})).toThrow(ProviderTransportError);
      expect(() => buildApnsPayload(alert, {})).toThrow(`exceeds ${APNS_MAX_PAYLOAD_BYTES}`);
    });
  });

  describe('buildApnsHeaders', () => {
    it('should add topic, expiration and priority when set', () => {
      expect(buildApnsHeaders('com.example.app', { expiration: 1700000000, priority: 5 })).toEqual({
        'apns-push-type': 'alert',
        'apns-topic': 'com.example.app',
        'apns-expiration': '1700000000',
        'apns-priority': '5',
      });
    });

    it('should send only the push type by default', () => {
      expect(buildApnsHeaders(undefined, {})).toEqual({ 'apns-push-type': 'alert' });
    });
  });

  describe('parseFeedbackFrames', () => {
    it('should decode each frame into a hex token', () => {
      // Arrange
      const buffer = Buffer.concat([
        feedbackFrame(1700000000, Buffer.from([0xde, 0xad, 0xbe, 0xef])),
        feedbackFrame(1700000001, Buffer.from([0xab, 0xcd])),
      ]);

      // Act & Assert
      expect(parseFeedbackFrames(buffer)).toEqual(['deadbeef', 'abcd']);
    });

    it('should drop a truncated trailing frame', () => {
      // Arrange
      const complete = feedbackFrame(1, Buffer.from([0x01, 0x02]));
      const truncated = feedbackFrame(2, Buffer.from([0x03, 0x04, 0x05, 0x06])).subarray(0, 8);

      // Act & Assert
      expect(parseFeedbackFrames(Buffer.concat([complete, truncated]))).toEqual(['0102']);
    });

    it('should return no tokens for an empty stream', () => {
      expect(parseFeedbackFrames(Buffer.alloc(0))).toEqual([]);
    });
  });

  describe('APNSAdapter', () => {
    it('should report the apns provider name', () => {
      expect(new APNSAdapter(config)).toHaveProperty('providerName', 'apns');
    });

    it('should return an empty response for no ids without reading credentials', async () => {
      // Arrange
      const adapter = new APNSAdapter(config);

      // Act
      const result = await adapter.sendBulk([], 'hi', {});

      // Assert
      expect(result).toEqual({ provider: 'apns', results: [] });
    });

    it('should refuse to send without a certificate', async () => {
      // Arrange
      const adapter = new APNSAdapter(config);

      // Act & Assert
      await expect(adapter.sendSingle('deadbeef', 'hi', {})).rejects.toThrow(
        'ProviderTransport(apns): APNS_CERTIFICATE is not configured'
      );
    });

    it('should refuse to read feedback without a certificate', async () => {
      // Arrange
      const adapter = new APNSAdapter(config);

      // Act & Assert
      await expect(adapter.fetchInactiveIds()).rejects.toThrow('ProviderTransport(apns): APNS_CERTIFICATE is not configured');
    });

    it('should report a certificate path that cannot be read', async () => {
      // Arrange
      const adapter = new APNSAdapter({ ...config, certificate: '/nonexistent/push-cert.pem' });

      // Act & Assert
      await expect(adapter.fetchInactiveIds()).rejects.toThrow('Cannot read certificate /nonexistent/push-cert.pem');
    });
  });
});
