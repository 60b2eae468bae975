import { ConfigService } from '@nestjs/config';
import fetch from 'node-fetch';
import { DeliveryError, ProbeError, RelocationError, SchedulingError } from '../errors/pipeline.errors';
import { channelPostOwner, userOwner } from '../pipeline/interfaces/owner.interface';
import { BridgeClient } from './bridge.client';
import { BridgeDeliveryGateway } from './bridge-delivery.gateway';
import { BridgePlanPolicy } from './bridge-plan.policy';
import { BridgeProcessingGateway } from './bridge-processing.gateway';

jest.mock('node-fetch', () => ({ __esModule: true, default: jest.fn() }));

const { Response } = jest.requireActual<typeof import('node-fetch')>('node-fetch');
const fetchMock = jest.mocked(fetch);

function answer(body: unknown, status = 200) {
  return new Response(body === null ? undefined : JSON.stringify(body), { status });
}

describe('bridge gateways', () => {
  const config = new ConfigService({
    PLATFORM_BRIDGE_URL: 'http://bridge.test',
    MAX_CONCURRENT_VIDEOS_REGULAR: 1,
    MAX_CONCURRENT_VIDEOS_PREMIUM: 4,
    MAX_CONCURRENT_VIDEOS_CHANNEL: 6,
  });
  const bridge = new BridgeClient(config);
  const asset = { sourceChatId: 10, sourceMessageId: 20, fileSize: 100, duration: 30 };

  beforeEach(() => {
    fetchMock.mockReset();
  });

  describe('BridgeProcessingGateway', () => {
    const gateway = new BridgeProcessingGateway(bridge);

    it('relocates and normalises numeric staging ids', async () => {
      fetchMock.mockResolvedValue(answer({ stagingId: 55 }));

      await expect(gateway.relocate(asset)).resolves.toEqual({ stagingId: '55', variants: [] });
      expect(fetchMock.mock.calls[0][0]).toBe('http://bridge.test/assets/relocate');
    });

    it('turns a failed relocation into a RelocationError', async () => {
      fetchMock.mockResolvedValue(answer({ error: 'gone' }, 404));

      await expect(gateway.relocate(asset)).rejects.toThrow(RelocationError);
    });

    it('parks a staged asset', async () => {
      fetchMock.mockResolvedValue(answer({ parkedHandle: 'h-1' }));

      await expect(gateway.parkForProcessing('55')).resolves.toBe('h-1');
      expect(fetchMock.mock.calls[0][0]).toBe('http://bridge.test/assets/55/park');
    });

    it('turns a failed park into a SchedulingError', async () => {
      fetchMock.mockResolvedValue(answer(null, 204));

      await expect(gateway.parkForProcessing('55')).rejects.toThrow(SchedulingError);
    });

    it('reads no variants as still processing', async () => {
      fetchMock.mockResolvedValueOnce(answer(null, 204)).mockResolvedValueOnce(answer({ variants: [] }));

      await expect(gateway.probeCompletion('h-1')).resolves.toBeNull();
      await expect(gateway.probeCompletion('h-1')).resolves.toBeNull();
    });

    it('returns the variants of a finished job', async () => {
      fetchMock.mockResolvedValue(answer({ variants: [{ fileId: 'f-1', height: 720 }] }));

      await expect(gateway.probeCompletion('h-1')).resolves.toEqual([{ fileId: 'f-1', height: 720 }]);
    });

    it('turns a failed probe into a ProbeError', async () => {
      fetchMock.mockRejectedValue(new Error('socket hang up'));

      await expect(gateway.probeCompletion('h-1')).rejects.toThrow(ProbeError);
    });

    it('treats an already removed parked asset as cancelled', async () => {
      fetchMock.mockResolvedValue(answer(null, 404));

      await expect(gateway.cancelParked('h-1')).resolves.toBeUndefined();
      expect(fetchMock.mock.calls[0][1]).toMatchObject({ method: 'DELETE' });
    });
  });

  describe('BridgeDeliveryGateway', () => {
    const gateway = new BridgeDeliveryGateway(bridge);

    it('returns how many variants were sent', async () => {
      fetchMock.mockResolvedValue(answer({ sent: 2 }));

      await expect(gateway.deliverResult(7, [{ fileId: 'a' }, { fileId: 'b' }])).resolves.toBe(2);
      expect(fetchMock.mock.calls[0][0]).toBe('http://bridge.test/users/7/deliveries');
    });

    it('turns a failed edit into a DeliveryError', async () => {
      fetchMock.mockResolvedValue(answer({ error: 'message not modified' }, 400));

      await expect(gateway.replaceInPlace(-100, 5, [{ fileId: 'a' }])).rejects.toThrow(DeliveryError);
      expect(fetchMock.mock.calls[0][0]).toBe('http://bridge.test/channels/-100/posts/5/media');
    });

    it('posts notices as text', async () => {
      fetchMock.mockResolvedValue(answer(null, 204));

      await gateway.notify(7, 'hello');

      expect(fetchMock.mock.calls[0][0]).toBe('http://bridge.test/users/7/notices');
      expect(fetchMock.mock.calls[0][1]).toMatchObject({ method: 'POST', body: '{"text":"hello"}' });
    });
  });

  describe('BridgePlanPolicy', () => {
    const policy = new BridgePlanPolicy(config, bridge);

    it('gives premium users the premium ceiling', async () => {
      fetchMock.mockResolvedValue(answer({ premium: true }));

      await expect(policy.limitFor(userOwner(7))).resolves.toBe(4);
      expect(fetchMock.mock.calls[0][0]).toBe('http://bridge.test/users/7/plan');
    });

    it('falls back to the regular ceiling when the lookup fails', async () => {
      fetchMock.mockResolvedValue(answer({ error: 'down' }, 503));

      await expect(policy.limitFor(userOwner(7))).resolves.toBe(1);
    });

    it('uses the channel ceiling without asking the bridge', async () => {
      await expect(policy.limitFor(channelPostOwner(-100, 1))).resolves.toBe(6);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });
});
