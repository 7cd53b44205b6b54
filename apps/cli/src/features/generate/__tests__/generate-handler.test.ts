import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Readable } from 'node:stream';

import { MemoryRejectionSink, processTransactions } from '@ledgerline/ingestion';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { GenerateHandler } from '../generate-handler.js';
import { GeneratorConfigError } from '../generator-config.js';

function config(output: { file: string; seed?: number }) {
  return {
    accounts: { count: 4 },
    amounts: { max: 50, min: 1, precision: 4 },
    disputes: { probability: 0.5, resolutionProbability: 0.5 },
    output,
    transactions: { maxPerAccount: 6, minPerAccount: 2 },
    withdrawals: { overdrawProbability: 0.2, probability: 0.4 },
  };
}

describe('GenerateHandler', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'generate-handler-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { force: true, recursive: true });
  });

  async function writeConfig(value: unknown): Promise<string> {
    const configPath = path.join(tmpDir, 'params.json');
    await fs.writeFile(configPath, JSON.stringify(value));
    return configPath;
  }

  it('should write a CSV file that processes without parse errors', async () => {
    const outputPath = path.join(tmpDir, 'generated.csv');
    const configPath = await writeConfig(config({ file: outputPath, seed: 99 }));

    const result = await new GenerateHandler().execute({ configPath });

    const generated = result._unsafeUnwrap();
    expect(generated.seed).toBe(99);
    expect(generated.accounts).toBe(4);

    const csv = await fs.readFile(outputPath, 'utf8');
    expect(csv.startsWith('type,client,tx,amount\n')).toBe(true);
    expect(csv.trimEnd().split('\n')).toHaveLength(generated.transactions + 1);

    const sink = new MemoryRejectionSink();
    const summary = (await processTransactions({ openSink: () => sink, source: outputPath }))._unsafeUnwrap();
    expect(summary.parseErrors).toBe(0);
    expect(summary.records).toBe(generated.transactions);
    expect(sink.lines).toHaveLength(summary.rejected);
  });

  it('should write to stdout when the output file is a dash', async () => {
    const written: string[] = [];
    const configPath = await writeConfig(config({ file: '-', seed: 5 }));

    const result = await new GenerateHandler((text) => written.push(text)).execute({ configPath });

    expect(result.isOk()).toBe(true);
    expect(written).toHaveLength(1);
    expect(written[0]?.startsWith('type,client,tx,amount\n')).toBe(true);
  });

  it('should produce identical output for the same seed', async () => {
    const outputs: string[] = [];
    const configPath = await writeConfig(config({ file: '-', seed: 12 }));
    const handler = new GenerateHandler((text) => outputs.push(text));

    await handler.execute({ configPath });
    await handler.execute({ configPath });

    expect(outputs).toHaveLength(2);
    expect(outputs[0]).toBe(outputs[1]);
  });

  it('should return a configuration error for an invalid file', async () => {
    const configPath = await writeConfig({ accounts: { count: 1 } });

    const result = await new GenerateHandler(() => undefined).execute({ configPath });

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(GeneratorConfigError);
  });

  it('should report a write failure as a general error', async () => {
    const blocker = path.join(tmpDir, 'blocker');
    await fs.writeFile(blocker, '');
    const configPath = await writeConfig(config({ file: path.join(blocker, 'out.csv'), seed: 1 }));

    const result = await new GenerateHandler().execute({ configPath });

    const error = result._unsafeUnwrapErr();
    expect(error).not.toBeInstanceOf(GeneratorConfigError);
    expect(error.message).toMatch(/^Failed to write '.*out\.csv': /);
  });

  it('should feed generated rows through a stream as well', async () => {
    const outputs: string[] = [];
    const configPath = await writeConfig(config({ file: '-', seed: 77 }));
    await new GenerateHandler((text) => outputs.push(text)).execute({ configPath });

    const summary = (await processTransactions({ source: Readable.from(outputs) }))._unsafeUnwrap();

    expect(summary.parseErrors).toBe(0);
    for (const account of summary.accounts) {
      expect(Number(account.total)).toBeCloseTo(Number(account.available) + Number(account.held), 4);
    }
  });
});
