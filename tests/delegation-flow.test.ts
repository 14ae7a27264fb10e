import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import { run } from '@tessera/cli';
import { keyPairFromPrivateKey, toHex } from '@tessera/crypto';
import { DelegationTarget, buildDelegationData, verifyTyped } from '@tessera/ledger';
import type { ExtraAgendaTransaction, NodeProvider } from '@tessera/ledger';

// ---------------------------------------------------------------------------
// End-to-end delegation: sign offline, then submit through the node
// ---------------------------------------------------------------------------

const SIGNED_AT = 1_700_000_000_000;
const SUBMITTED_AT = SIGNED_AT + 90_000;
const PRIVATE_KEY = new Uint8Array(32).fill(7);
const DELEGATEE_HEX = 'bb'.repeat(32);
const TARGET_HEIGHT = 40;

let publicKeyHex = '';
let dir: string;

function recordingProvider() {
  const submitted: ExtraAgendaTransaction[] = [];
  const node = {
    sync: vi.fn(async () => {}),
    clean: vi.fn(async () => {}),
    createExtraAgendaTransaction: vi.fn(async (transaction: ExtraAgendaTransaction) => {
      submitted.push(transaction);
    }),
    createBlock: vi.fn(async () => {}),
    createAgenda: vi.fn(async () => {}),
    vote: vi.fn(async () => {}),
    vetoRound: vi.fn(async () => {}),
    vetoBlock: vi.fn(async () => {}),
    progressForConsensus: vi.fn(async () => {}),
    fetch: vi.fn(async () => {}),
    broadcast: vi.fn(async () => {}),
    show: vi.fn(async () => {
      throw new Error('no commits in this fixture');
    }),
  };
  const provider: NodeProvider = {
    genesis: vi.fn(async () => {}),
    clone: vi.fn(async () => {}),
    initialize: vi.fn(async () => node),
    serve: vi.fn(async () => {}),
  };
  return { provider, submitted };
}

function tessera(argv: string[], now: number, provider?: NodeProvider) {
  return run([...argv, '--no-color', '--path', dir], {
    clock: () => now,
    env: {},
    logOutput: () => {},
    ...(provider ? { provider } : {}),
  });
}

/** Split `sign` text output into the proof and the stamp it was signed for. */
function signedOutput(stdout: string): { proof: string; blockHeight: number; timestamp: number } {
  const [proof = '', ...rest] = stdout.split('\n');
  const field = (name: string): number => {
    const line = rest.find((l) => l.startsWith(`${name} `));
    return Number(line?.slice(name.length).trim());
  };
  return { proof, blockHeight: field('block height'), timestamp: field('timestamp') };
}

beforeAll(async () => {
  publicKeyHex = (await keyPairFromPrivateKey(PRIVATE_KEY)).publicKeyHex;
});

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'tessera-flow-'));
  writeFileSync(join(dir, 'config.json'), JSON.stringify({ publicKey: publicKeyHex, privateKey: toHex(PRIVATE_KEY) }));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('delegation flow', () => {
  it('submits a signed delegation whose proof verifies on the node side', async () => {
    const signed = await tessera(
      ['sign', 'tx-delegate', `"${DELEGATEE_HEX}"`, 'true', String(TARGET_HEIGHT)],
      SIGNED_AT,
    );
    expect(signed.exitCode).toBe(0);
    const printed = signedOutput(signed.stdout);
    expect(printed.blockHeight).toBe(TARGET_HEIGHT);
    expect(printed.timestamp).toBe(SIGNED_AT);

    const { provider, submitted } = recordingProvider();
    const created = await tessera(
      ['create', 'tx-delegate', `"${publicKeyHex}"`, `"${DELEGATEE_HEX}"`, 'true', printed.proof],
      SUBMITTED_AT,
      provider,
    );
    expect(created.exitCode).toBe(0);
    expect(submitted).toHaveLength(1);

    const transaction = submitted[0];
    expect(transaction?.type).toBe('delegate');
    if (transaction?.type !== 'delegate') return;
    const { tx } = transaction;
    expect(tx.timestamp).toBe(SUBMITTED_AT);

    const payload = buildDelegationData(
      { delegator: tx.delegator, delegatee: tx.delegatee, governance: tx.governance, blockHeight: printed.blockHeight },
      () => printed.timestamp,
    );
    expect(await verifyTyped(DelegationTarget, payload, tx.proof)).toBe(true);
  });

  it('submits an undelegation proof as a delegation, which then fails to verify', async () => {
    const signed = await tessera(['sign', 'tx-undelegate', String(TARGET_HEIGHT)], SIGNED_AT);
    const printed = signedOutput(signed.stdout);
    const { provider, submitted } = recordingProvider();
    await tessera(
      ['create', 'tx-delegate', `"${publicKeyHex}"`, `"${DELEGATEE_HEX}"`, 'true', printed.proof],
      SUBMITTED_AT,
      provider,
    );

    const transaction = submitted[0];
    if (transaction?.type !== 'delegate') throw new Error('expected a delegate transaction');
    const { tx } = transaction;
    const payload = buildDelegationData(
      { delegator: tx.delegator, delegatee: tx.delegatee, governance: tx.governance, blockHeight: printed.blockHeight },
      () => printed.timestamp,
    );
    expect(await verifyTyped(DelegationTarget, payload, tx.proof)).toBe(false);
  });

  it('prints the signed payload next to the proof with --json', async () => {
    const signed = await tessera(['sign', 'tx-delegate', `"${DELEGATEE_HEX}"`, 'false', '7', '--json'], SIGNED_AT);
    expect(JSON.parse(signed.stdout)).toMatchObject({
      payload: {
        delegator: publicKeyHex,
        delegatee: DELEGATEE_HEX,
        governance: false,
        blockHeight: 7,
        timestamp: SIGNED_AT,
      },
      proof: { signer: publicKeyHex },
    });
  });
});
