/**
 * CLI Argument Parsing
 *
 * Parses command line arguments for the present-proof agent.
 */

import { z } from 'zod';
import {
  Hex32Schema,
  PublicKeyHexSchema,
  assertHex32,
  isDid,
  isLogLevel,
  type LogLevel,
} from '@proofwire/protocol';

// Room name pattern accepted by the relay: 1-64 chars, alphanumeric + underscore + hyphen
const ROOM_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

export const DEFAULT_RELAY = 'ws://localhost:8787';

export const AgentConfigSchema = z.object({
  role: z.enum(['verifier', 'prover']),
  room: z.string().regex(ROOM_PATTERN, 'Must be 1-64 letters, digits, "_" or "-"'),
  relay: z.string().url(),
  did: z.string().refine(isDid, 'Must be a DID (did:method:id)'),
  key: Hex32Schema,
  peerDid: z.string().refine(isDid, 'Must be a DID (did:method:id)'),
  peerKey: PublicKeyHexSchema,
  logLevel: z.custom<LogLevel>(
    (v) => typeof v === 'string' && isLogLevel(v),
    'Must be one of silent, error, warn, info, debug'
  ),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type Role = AgentConfig['role'];

const FLAGS: Record<keyof AgentConfig, string> = {
  role: '--role',
  room: '--room',
  relay: '--relay',
  did: '--did',
  key: '--key',
  peerDid: '--peer-did',
  peerKey: '--peer-key',
  logLevel: '--log-level',
};

function flagFor(field: string | number | undefined): string {
  const match = Object.entries(FLAGS).find(([key]) => key === field);
  return match ? match[1] : String(field);
}

export const USAGE = [
  'Usage: proofwire-agent --role <verifier|prover> --room <room-name> [options]',
  '',
  'Options:',
  '  --role          Required. verifier or prover',
  '  --room          Required. Room name to join',
  `  --relay         Relay URL (default: ${DEFAULT_RELAY})`,
  '  --did           Required. DID of this agent',
  '  --key           Required. Signing key of this agent (0x + 64 hex chars)',
  '  --peer-did      Required. DID of the other agent',
  '  --peer-key      Required. Uncompressed public key of the other agent',
  '  --log-level     silent, error, warn, info or debug (default: info)',
].join('\n');

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): AgentConfig {
  const args = argv.slice(2);

  // Defaults
  let role: string | undefined;
  let room: string | undefined;
  let relay = DEFAULT_RELAY;
  let did: string | undefined;
  let key: string | undefined;
  let peerDid: string | undefined;
  let peerKey: string | undefined;
  let logLevel = 'info';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next: string | undefined = args[i + 1];

    if (!arg.startsWith('--')) {
      throw new Error(`Unexpected argument: ${arg}`);
    }
    if (next === undefined) {
      throw new Error(`${arg} requires a value`);
    }

    switch (arg) {
      case '--role':
        if (next !== 'verifier' && next !== 'prover') {
          throw new Error('--role must be "verifier" or "prover"');
        }
        role = next;
        i++;
        break;
      case '--room':
        room = next;
        i++;
        break;
      case '--relay':
        relay = next;
        i++;
        break;
      case '--did':
        did = next;
        i++;
        break;
      case '--key':
        key = next;
        i++;
        break;
      case '--peer-did':
        peerDid = next;
        i++;
        break;
      case '--peer-key':
        peerKey = next;
        i++;
        break;
      case '--log-level':
        logLevel = next;
        i++;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  // Validate required args
  if (!role) {
    throw new Error('--role is required (verifier or prover)');
  }
  if (!room) {
    throw new Error('--room is required');
  }
  if (key !== undefined) {
    assertHex32('--key', key);
  }

  const result = AgentConfigSchema.safeParse({ role, room, relay, did, key, peerDid, peerKey, logLevel });
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`${flagFor(issue?.path[0])}: ${issue?.message}`);
  }

  return result.data;
}
