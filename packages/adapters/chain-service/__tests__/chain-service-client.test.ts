/**
 * Chain Service Client Tests
 *
 * End-to-end through retry, executor and transport, with the chain service
 * replaced by an in-process axios adapter.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import type { Logger } from 'pino';
import { ChainServiceClient, type ChainServiceClientConfig } from '../chain-service-client.js';
import { ConfigurationError, ProtocolError, TransportError, ValidationError } from '../errors.js';
import { FakeChainService, captureError, createMockLogger } from './fake-chain-service.js';
import { buildHyperparameters, buildMetagraphWire, toWire } from './fixtures.js';

describe('ChainServiceClient', () => {
  let logger: Logger;
  let fake: FakeChainService;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let client: ChainServiceClient;

  const createClient = (overrides: Partial<ChainServiceClientConfig> = {}): ChainServiceClient =>
    new ChainServiceClient(logger, {
      host: 'localhost',
      port: 3000,
      adapter: fake.adapter,
      ...overrides,
      retry: { sleep, ...overrides.retry },
    });

  beforeEach(() => {
    logger = createMockLogger();
    fake = new FakeChainService();
    sleep = vi.fn<(ms: number) => Promise<void>>(() => Promise.resolve());
    client = createClient();
  });

  afterEach(async () => {
    await client.close();
  });

  describe('initialization', () => {
    it('should build the base URL from host and port', () => {
      expect(client.baseUrl).toBe('http://localhost:3000');
    });

    it('should log and reject an empty host or port', () => {
      expect(() => new ChainServiceClient(logger, { host: '', port: 3000 })).toThrow(ConfigurationError);
      expect(logger.error).toHaveBeenCalledWith({ host: '' }, 'Could not resolve chain service host');

      expect(() => new ChainServiceClient(logger, { host: 'localhost', port: '' })).toThrow(
        'Could not resolve chain service port'
      );
      expect(logger.error).toHaveBeenCalledWith({ port: '' }, 'Could not resolve chain service port');
    });
  });

  describe('getMetagraph', () => {
    it('should fill each axon with the keys at its uid', async () => {
      fake.ok('GET', 'chain/subnet-metagraph/1', buildMetagraphWire(2));

      const metagraph = await client.getMetagraph(1);

      expect(metagraph.axons.map((axon) => [axon.hotkey, axon.coldkey])).toEqual([
        ['hotkey-0', 'coldkey-0'],
        ['hotkey-1', 'coldkey-1'],
      ]);
      expect(metagraph.difficulty).toBe(10_000_000n);
    });

    it('should reject a metagraph with inconsistent lengths', async () => {
      fake.ok('GET', 'chain/subnet-metagraph/1', { ...buildMetagraphWire(2), axons: [] });

      await expect(client.getMetagraph(1)).rejects.toBeInstanceOf(ProtocolError);
      expect(fake.calls).toHaveLength(1);
      expect(logger.error).toHaveBeenCalledWith(
        {
          record: 'subnet metagraph',
          error: 'Chain service returned an invalid subnet metagraph',
          details: { issues: [{ path: 'axons', message: 'expected 2 entries (numUids), got 0' }] },
        },
        'Invalid chain service record'
      );
    });

    it('should return hotkeys in uid order', async () => {
      fake.ok('GET', 'chain/subnet-metagraph/4', buildMetagraphWire(3, 4));

      await expect(client.getHotkeys(4)).resolves.toEqual(['hotkey-0', 'hotkey-1', 'hotkey-2']);
    });
  });

  describe('getAxons', () => {
    it('should return denormalized axons', async () => {
      fake.ok('GET', 'chain/subnet-metagraph/1', buildMetagraphWire(2));

      const axons = await client.getAxons(1);

      expect(axons[1]).toEqual({
        block: 101,
        version: 1,
        ip: '10.0.0.2',
        port: 8092,
        ipType: 4,
        protocol: 4,
        placeholder1: 0,
        placeholder2: 0,
        hotkey: 'hotkey-1',
        coldkey: 'coldkey-1',
      });
    });

    it('should warn and return an empty list for an empty subnet', async () => {
      fake.ok('GET', 'chain/subnet-metagraph/3', buildMetagraphWire(0, 3));

      await expect(client.getAxons(3)).resolves.toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith({ netuid: 3 }, 'No axons found in metagraph response');
    });
  });

  describe('getCurrentBlock', () => {
    it('should coerce a string block number', async () => {
      fake.ok('GET', 'chain/latest-block', { blockNumber: '4200' });

      await expect(client.getCurrentBlock()).resolves.toBe(4200);
    });
  });

  describe('getSubnetHyperparameters', () => {
    it('should fetch the subnet record', async () => {
      fake.ok('GET', 'chain/subnet-hyperparameters/2', {
        ...toWire(buildHyperparameters()),
        difficulty: '0x10',
      });

      const hyperparameters = await client.getSubnetHyperparameters(2);

      expect(hyperparameters.tempo).toBe(360);
      expect(hyperparameters.difficulty).toBe(16n);
      expect(hyperparameters.maxDifficulty).toBe(4_611_686_018_427_387_903n);
    });

    it('should log and reject a record with a missing field', async () => {
      const { tempo: _tempo, ...withoutTempo } = toWire(buildHyperparameters());
      fake.ok('GET', 'chain/subnet-hyperparameters/2', withoutTempo);

      await expect(client.getSubnetHyperparameters(2)).rejects.toBeInstanceOf(ProtocolError);
      expect(logger.error).toHaveBeenCalledWith(
        expect.objectContaining({ record: 'subnet hyperparameters' }),
        'Invalid chain service record'
      );
    });
  });

  describe('isHotkeyRegistered', () => {
    it('should send netuid and hotkey and omit an absent block', async () => {
      fake.ok('GET', 'chain/check-hotkey', { isHotkeyValid: true });

      await expect(client.isHotkeyRegistered(1, '5F-test')).resolves.toBe(true);
      expect(fake.calls[0].params).toEqual({ netuid: 1, hotkey: '5F-test' });
    });

    it('should send the block when given', async () => {
      fake.ok('GET', 'chain/check-hotkey', { isHotkeyValid: false });

      await expect(client.isHotkeyRegistered(1, '5F-test', 900)).resolves.toBe(false);
      expect(fake.calls[0].params).toEqual({ netuid: 1, hotkey: '5F-test', block: 900 });
    });

    it('should treat a missing flag as unregistered', async () => {
      fake.ok('GET', 'chain/check-hotkey', {});

      await expect(client.isHotkeyRegistered(1, '5F-test')).resolves.toBe(false);
    });
  });

  describe('serveAxon', () => {
    it('should fill in protocol defaults', async () => {
      fake.ok('POST', 'chain/serve-axon', null);

      await client.serveAxon({ netuid: 1, ip: 167772167, port: 8091 });

      expect(fake.calls[0].body).toEqual({
        netuid: 1,
        version: 1,
        ip: 167772167,
        port: 8091,
        ipType: 4,
        protocol: 4,
        placeholder1: 0,
        placeholder2: 0,
      });
    });
  });

  describe('signMessage', () => {
    it('should return the signature', async () => {
      fake.ok('POST', 'substrate/sign-message/sign', { signature: '0xabc123' });

      await expect(client.signMessage('hello')).resolves.toBe('0xabc123');
      expect(fake.calls[0].body).toEqual({ message: 'hello' });
    });

    it('should log and return undefined when no signature comes back', async () => {
      fake.ok('POST', 'substrate/sign-message/sign', { error: 'keyring locked' });

      await expect(client.signMessage('hello')).resolves.toBeUndefined();
      expect(logger.error).toHaveBeenCalledWith(
        { reason: 'keyring locked' },
        'Failed to sign message using chain service'
      );
    });
  });

  describe('verify', () => {
    it('should reject a non-hex signature without calling the service', async () => {
      const error = await captureError(() => client.verify('5F-test', 'hello', 'not-hex'));

      expect(error).toBeInstanceOf(ValidationError);
      expect(fake.calls).toHaveLength(0);
    });

    it('should send the message, signature and signee', async () => {
      fake.ok('POST', 'substrate/sign-message/verify', { valid: true });

      await expect(client.verify('5F-test', 'hello', '0xabc123')).resolves.toBe(true);
      expect(fake.calls[0].body).toEqual({
        message: 'hello',
        signature: '0xabc123',
        signeeAddress: '5F-test',
      });
    });

    it('should return false when the service sends no data', async () => {
      fake.ok('POST', 'substrate/sign-message/verify', null);

      await expect(client.verify('5F-test', 'hello', '0xabc123')).resolves.toBe(false);
    });
  });

  describe('getKeyringPair', () => {
    it('should return the service identity', async () => {
      fake.ok('GET', 'substrate/keyring-pair-info', { hotkey: '5F-hot', coldkey: '5F-cold' });

      await expect(client.getKeyringPair()).resolves.toEqual({ hotkey: '5F-hot', coldkey: '5F-cold' });
    });
  });

  describe('retries', () => {
    it('should retry an application error and count it', async () => {
      fake.reply(
        'GET',
        'chain/latest-block',
        { body: { data: {}, error: 'still indexing' } },
        { body: { data: { blockNumber: 9 }, statusCode: 200 } }
      );

      await expect(client.getCurrentBlock()).resolves.toBe(9);

      expect(fake.calls).toHaveLength(2);
      expect(sleep).toHaveBeenCalledWith(1000);
      expect(client.getStats()).toEqual({
        totalRequests: 1,
        successfulRequests: 1,
        failedRequests: 0,
        retries: 1,
      });
    });

    it('should give up on transport errors after maxAttempts', async () => {
      const onRetry = vi.fn();
      await client.close();
      client = createClient({ retry: { maxAttempts: 2, onRetry } });
      fake.reply('GET', 'chain/latest-block', { networkError: 'socket hang up', code: 'ECONNRESET' });

      await expect(client.getCurrentBlock()).rejects.toBeInstanceOf(TransportError);

      expect(fake.calls).toHaveLength(2);
      expect(onRetry).toHaveBeenCalledTimes(1);
      expect(client.getStats()).toEqual({
        totalRequests: 1,
        successfulRequests: 0,
        failedRequests: 1,
        retries: 1,
      });
    });

    it('should not retry a malformed body', async () => {
      fake.reply('GET', 'chain/latest-block', { raw: 'not json' });

      await expect(client.getCurrentBlock()).rejects.toBeInstanceOf(ProtocolError);
      expect(fake.calls).toHaveLength(1);
      expect(sleep).not.toHaveBeenCalled();
    });
  });

  describe('close', () => {
    it('should serve requests again after close', async () => {
      fake.ok('GET', 'chain/latest-block', { blockNumber: 1 });

      await client.close();
      await client.close();

      await expect(client.getCurrentBlock()).resolves.toBe(1);
    });
  });
});
