// src/test-support/collaborators.ts
// Fake archiver and scanner programs for end-to-end runs. They are written
// into a temp directory and run with the current Node binary.
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import type { ArchiverConfig, Collaborator } from '@/runner/pipeline/types';

export const writeScript = async (
  root: string,
  rel: string,
  src: string,
): Promise<string> => {
  const abs = path.join(root, rel);
  await mkdir(path.dirname(abs), { recursive: true });
  await writeFile(abs, src, 'utf8');
  return abs;
};

/**
 * Archives are JSON documents: { "entries": { "<relative path>": "<content>" } }.
 * Leading flags (before the dialect arguments):
 *   --fail-pack    write a partial archive, then exit 2 on compress
 *   --log=<file>   append the received argv as one JSON line
 */
const ARCHIVER_SRC = String.raw`
import { appendFileSync, mkdirSync, readdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import path from 'node:path';

const argv = process.argv.slice(2);
let failPack = false;
let log;
while (argv.length > 0 && (argv[0] === '--fail-pack' || argv[0].startsWith('--log='))) {
  const flag = argv.shift();
  if (flag === '--fail-pack') failPack = true;
  else log = flag.slice('--log='.length);
}
if (log) appendFileSync(log, JSON.stringify({ tool: 'archiver', argv }) + '\n');

const fail = (msg, code) => {
  process.stderr.write(msg + '\n');
  process.exit(code);
};

const extractTo = (archive, dir) => {
  let doc;
  try {
    doc = JSON.parse(readFileSync(archive, 'utf8'));
  } catch {
    fail('cannot open archive ' + archive, 2);
  }
  for (const [rel, body] of Object.entries(doc.entries ?? {})) {
    const p = path.join(dir, rel);
    mkdirSync(path.dirname(p), { recursive: true });
    writeFileSync(p, body);
  }
  process.stdout.write('extracted ' + Object.keys(doc.entries ?? {}).length + ' entries\n');
};

const collect = (p, name, out) => {
  if (statSync(p).isDirectory()) {
    for (const n of readdirSync(p)) collect(path.join(p, n), name + '/' + n, out);
  } else {
    out[name] = readFileSync(p, 'utf8');
  }
};

const compress = (entries, archive) => {
  if (failPack) {
    writeFileSync(archive, 'PARTIAL');
    fail('disk full while writing ' + archive, 2);
  }
  const out = {};
  for (const e of entries) collect(e, path.basename(e), out);
  writeFileSync(archive, JSON.stringify({ entries: out }));
};

const [op, ...rest] = argv;
if (op === 'x') {
  const dir = rest.find((a) => a.startsWith('-o')).slice(2);
  extractTo(rest[1], dir);
} else if (op === 'a') {
  compress(rest.slice(1, -1), rest[0]);
} else if (op === 'extract') {
  extractTo(rest[0], rest[rest.indexOf('--output-dir') + 1]);
} else if (op === 'compress') {
  const at = rest.indexOf('--output');
  compress(rest.slice(0, at), rest[at + 1]);
} else {
  fail('unknown operation ' + op, 7);
}
`;

/**
 * Leading flags (before the directory):
 *   --exit=<n>        exit status (default 0)
 *   --touch=<name>    write <dir>/<name> before exiting (an in-place repair)
 *   --sleep=<ms>      wait before exiting
 *   --log=<file>      append the received argv as one JSON line
 */
const SCANNER_SRC = String.raw`
import { appendFileSync, readdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';

const argv = process.argv.slice(2);
const opts = {};
while (argv.length > 1 && argv[0].startsWith('--')) {
  const flag = argv.shift().slice(2);
  const at = flag.indexOf('=');
  opts[flag.slice(0, at)] = flag.slice(at + 1);
}
if (opts.log) appendFileSync(opts.log, JSON.stringify({ tool: 'scanner', argv }) + '\n');
const dir = argv[0];
process.stdout.write('Scanning [' + dir + '] ' + readdirSync(dir).length + ' entries\n');
if (opts.touch) writeFileSync(path.join(dir, opts.touch), 'fixed');
const code = Number(opts.exit ?? 0);
const done = () => {
  if (code !== 0) process.stderr.write('scan found invalid files\n');
  process.exit(code);
};
if (opts.sleep) setTimeout(done, Number(opts.sleep));
else done();
`;

export type FakeCollaborators = {
  archiver: (opts?: {
    dialect?: ArchiverConfig['dialect'];
    failPack?: boolean;
    log?: string;
  }) => ArchiverConfig;
  scanner: (opts?: {
    exit?: number;
    touch?: string;
    sleepMs?: number;
    log?: string;
  }) => Collaborator;
};

/** Write both fake programs under `<root>/bin` and return collaborator builders. */
export const installFakeCollaborators = async (
  root: string,
): Promise<FakeCollaborators> => {
  const archiverPath = await writeScript(root, 'bin/archiver.mjs', ARCHIVER_SRC);
  const scannerPath = await writeScript(root, 'bin/scanner.mjs', SCANNER_SRC);
  return {
    archiver: (opts = {}) => ({
      command: process.execPath,
      args: [
        archiverPath,
        ...(opts.failPack ? ['--fail-pack'] : []),
        ...(opts.log ? [`--log=${opts.log}`] : []),
      ],
      dialect: opts.dialect ?? '7z',
    }),
    scanner: (opts = {}) => ({
      command: process.execPath,
      args: [
        scannerPath,
        ...(typeof opts.exit === 'number' ? [`--exit=${String(opts.exit)}`] : []),
        ...(opts.touch ? [`--touch=${opts.touch}`] : []),
        ...(opts.sleepMs ? [`--sleep=${String(opts.sleepMs)}`] : []),
        ...(opts.log ? [`--log=${opts.log}`] : []),
      ],
    }),
  };
};

/** Write a fake archive (see ARCHIVER_SRC) and return its absolute path. */
export const writeFakeArchive = async (
  root: string,
  name: string,
  entries: Record<string, string>,
): Promise<string> =>
  writeScript(root, name, JSON.stringify({ entries }));

const fakeArchiveSchema = z.object({
  entries: z.record(z.string()).default({}),
});

/** Parse a fake archive written by the fake archiver. */
export const readFakeArchive = (text: string): Record<string, string> =>
  fakeArchiveSchema.parse(JSON.parse(text)).entries;
