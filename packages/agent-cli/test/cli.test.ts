import { expect, test } from 'vitest';
import { DEFAULT_RELAY, parseArgs } from '../src/cli.js';

const KEY = `0x${'11'.repeat(32)}`;
const PEER_KEY = `0x04${'ab'.repeat(64)}`;

function argv(overrides: Record<string, string | null> = {}): string[] {
  const flags: Record<string, string | null> = {
    '--role': 'verifier',
    '--room': 'room-1',
    '--did': 'did:example:verifier',
    '--key': KEY,
    '--peer-did': 'did:example:prover',
    '--peer-key': PEER_KEY,
    ...overrides,
  };

  const args = ['node', 'proofwire-agent'];
  for (const [flag, value] of Object.entries(flags)) {
    if (value !== null) {
      args.push(flag, value);
    }
  }
  return args;
}

test('parseArgs applies defaults', () => {
  expect(parseArgs(argv())).toEqual({
    role: 'verifier',
    room: 'room-1',
    relay: DEFAULT_RELAY,
    did: 'did:example:verifier',
    key: KEY,
    peerDid: 'did:example:prover',
    peerKey: PEER_KEY,
    logLevel: 'info',
  });
});

test('parseArgs accepts relay and log level', () => {
  const config = parseArgs(argv({ '--relay': 'ws://relay.test:9000', '--log-level': 'debug', '--role': 'prover' }));
  expect(config.relay).toBe('ws://relay.test:9000');
  expect(config.logLevel).toBe('debug');
  expect(config.role).toBe('prover');
});

test('parseArgs requires role and room', () => {
  expect(() => parseArgs(argv({ '--role': null }))).toThrow('--role is required (verifier or prover)');
  expect(() => parseArgs(argv({ '--room': null }))).toThrow('--room is required');
  expect(() => parseArgs(argv({ '--role': 'holder' }))).toThrow('--role must be "verifier" or "prover"');
});

test('parseArgs validates DIDs', () => {
  expect(() => parseArgs(argv({ '--did': 'verifier' }))).toThrow('--did: Must be a DID (did:method:id)');
  expect(() => parseArgs(argv({ '--peer-did': null }))).toThrow('--peer-did: Required');
});

test('parseArgs validates keys', () => {
  expect(() => parseArgs(argv({ '--key': '0x1234' }))).toThrow(
    '--key must be exactly 32 bytes (0x + 64 hex chars), got 2 bytes'
  );
  expect(() => parseArgs(argv({ '--key': `0x${'AA'.repeat(32)}` }))).toThrow('--key must be lowercase hex');
  expect(() => parseArgs(argv({ '--peer-key': `0x02${'ab'.repeat(32)}` }))).toThrow(
    '--peer-key: Must be an uncompressed secp256k1 public key (0x04 + 128 hex chars)'
  );
});

test('parseArgs validates room, relay and log level', () => {
  expect(() => parseArgs(argv({ '--room': 'no spaces' }))).toThrow('--room: Must be 1-64 letters');
  expect(() => parseArgs(argv({ '--relay': 'not a url' }))).toThrow('--relay: Invalid url');
  expect(() => parseArgs(argv({ '--log-level': 'verbose' }))).toThrow(
    '--log-level: Must be one of silent, error, warn, info, debug'
  );
});

test('parseArgs rejects unknown and incomplete options', () => {
  expect(() => parseArgs([...argv(), '--chainId', '1'])).toThrow('Unknown option: --chainId');
  expect(() => parseArgs([...argv(), '--relay'])).toThrow('--relay requires a value');
  expect(() => parseArgs([...argv(), 'extra'])).toThrow('Unexpected argument: extra');
});
