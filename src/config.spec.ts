import test from 'node:test';
import assert from 'node:assert/strict';

import { DEFAULT_RPC_URL, loadConfig } from './config.js';

test('defaults with an empty environment', () => {
    assert.deepEqual(loadConfig({}), {
        rpcUrl: DEFAULT_RPC_URL,
        commitment: 'confirmed',
        mappingKey: null,
        debug: false,
    });
});

test('RPC_URL wins over SOLANA_RPC_URL', () => {
    const env = { RPC_URL: 'http://localhost:8899', SOLANA_RPC_URL: 'https://rpc.example.com' };
    assert.equal(loadConfig(env).rpcUrl, 'http://localhost:8899');
    assert.equal(loadConfig({ SOLANA_RPC_URL: 'https://rpc.example.com' }).rpcUrl, 'https://rpc.example.com');
});

test('rejects a non-http RPC url', () => {
    assert.throws(() => loadConfig({ RPC_URL: 'ws://localhost:8900' }), {
        message: 'Invalid RPC_URL: ws://localhost:8900 (expected http:// or https://)',
    });
});

test('reads COMMITMENT and rejects unknown levels', () => {
    assert.equal(loadConfig({ COMMITMENT: 'finalized' }).commitment, 'finalized');
    assert.throws(() => loadConfig({ COMMITMENT: 'max' }), {
        message: 'Invalid COMMITMENT: max (expected one of processed, confirmed, finalized)',
    });
});

test('parses MAPPING_KEY as a base58 pubkey', () => {
    const config = loadConfig({ MAPPING_KEY: '11111111111111111111111111111111' });
    assert.deepEqual(config.mappingKey, new Uint8Array(32));
});

test('rejects a MAPPING_KEY of the wrong length', () => {
    assert.throws(() => loadConfig({ MAPPING_KEY: '1111' }), {
        message: 'Invalid MAPPING_KEY: [parseKey] expected 32 bytes, got 4 for 1111',
    });
});

test('DEBUG=1 turns on debug logging', () => {
    assert.equal(loadConfig({ DEBUG: '1' }).debug, true);
    assert.equal(loadConfig({ DEBUG: 'true' }).debug, false);
});
