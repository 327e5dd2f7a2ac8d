import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import {
  readDependencyMap,
  readEmbeddings,
  readExtractionArtifact,
  writeDependencyMap,
  writeErrors,
  writeExtractionArtifact,
} from '../../src/graph/builder/extraction-artifact';
import { ArtifactFormatError } from '../../src/utils/errors';
import { makeClass, makeFile, makeMethod } from '../helpers/record-factory';

describe('extraction artifacts', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'artifacts-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads back what it writes', async () => {
    const records = [
      makeFile('A.java', {
        packageName: 'app',
        classes: [makeClass('A', 'A.java', { package: 'app' })],
        methods: [makeMethod({ name: 'a', className: 'A', file: 'A.java', packageName: 'app' })],
      }),
    ];
    const artifact = path.join(dir, 'nested', 'extraction.json');

    await writeExtractionArtifact(artifact, records);

    expect(await readExtractionArtifact(artifact)).toEqual(records);
  });

  it('defaults missing docs to an empty list', async () => {
    const { docs, ...withoutDocs } = makeFile('A.java');
    expect(docs).toEqual([]);
    const artifact = path.join(dir, 'extraction.json');
    await fs.writeFile(artifact, JSON.stringify([withoutDocs]));

    const [record] = await readExtractionArtifact(artifact);

    expect(record.docs).toEqual([]);
  });

  it('rejects records that fail validation', async () => {
    const artifact = path.join(dir, 'extraction.json');
    await fs.writeFile(artifact, JSON.stringify([{ path: 'A.java', language: 'kotlin' }]));

    await expect(readExtractionArtifact(artifact)).rejects.toBeInstanceOf(ArtifactFormatError);
  });

  it('rejects a method without a signature', async () => {
    const record = makeFile('A.java', {
      methods: [makeMethod({ name: 'a', className: 'A', file: 'A.java' })],
    });
    record.methods[0].method_signature = '';
    const artifact = path.join(dir, 'extraction.json');
    await writeExtractionArtifact(artifact, [record]);

    await expect(readExtractionArtifact(artifact)).rejects.toThrow(
      `Invalid artifact ${artifact}: 0.methods.0.method_signature: String must contain at least 1 character(s)`
    );
  });

  it('rejects malformed JSON', async () => {
    const artifact = path.join(dir, 'dependencies.json');
    await fs.writeFile(artifact, '{ not json');

    await expect(readDependencyMap(artifact)).rejects.toBeInstanceOf(ArtifactFormatError);
  });

  it('round-trips the dependency map', async () => {
    const artifact = path.join(dir, 'dependencies.json');

    await writeDependencyMap(artifact, { 'org.slf4j': '2.0.9' });

    expect(await readDependencyMap(artifact)).toEqual({ 'org.slf4j': '2.0.9' });
  });

  it('treats a missing embeddings file as no vectors', async () => {
    expect(await readEmbeddings(path.join(dir, 'embeddings.json'))).toEqual({
      files: [],
      methods: [],
    });
  });

  it('fills in an absent embeddings section', async () => {
    const artifact = path.join(dir, 'embeddings.json');
    await fs.writeFile(artifact, JSON.stringify({ files: [[0.1, 0.2]] }));

    expect(await readEmbeddings(artifact)).toEqual({ files: [[0.1, 0.2]], methods: [] });
  });

  it('writes parse errors as JSON', async () => {
    const artifact = path.join(dir, 'errors.json');

    await writeErrors(artifact, [{ filePath: 'Broken.java', message: 'Content appears to be binary' }]);

    expect(JSON.parse(await fs.readFile(artifact, 'utf-8'))).toEqual([
      { filePath: 'Broken.java', message: 'Content appears to be binary' },
    ]);
  });
});
