/**
 * @module serialization/schema
 *
 * Loads the `.proto` wire schema once per process. The directory comes from
 * `STENCIL_IR_PROTO_DIR` or defaults to the package's `proto/` folder, which sits two levels
 * above this module in the source tree and three levels above it in `dist/`.
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import protobuf from 'protobufjs';
import type { Root, Type } from 'protobufjs';

import { ConfigService } from '../config/config-service.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('schema');

const PROTO_FILES = ['statements.proto', 'iir.proto', 'hir.proto'] as const;

export const MessageTypes = {
  Stmt: 'stencil.statements.Stmt',
  Expr: 'stencil.statements.Expr',
  StencilInstantiation: 'stencil.iir.StencilInstantiation',
  Hir: 'stencil.hir.HIR',
} as const;

export type MessageTypeName = (typeof MessageTypes)[keyof typeof MessageTypes];

let cachedRoot: Root | null = null;

export function resolveProtoDir(): string {
  const configured = ConfigService.getInstance().protoDir;
  if (configured) return configured;
  const candidates = [
    fileURLToPath(new URL('../../proto/', import.meta.url)),
    fileURLToPath(new URL('../../../proto/', import.meta.url)),
  ];
  const found = candidates.find(dir => fs.existsSync(path.join(dir, PROTO_FILES[0])));
  return found ?? candidates[0] ?? '';
}

export function loadSchema(): Root {
  if (cachedRoot) return cachedRoot;
  const dir = resolveProtoDir();
  const root = new protobuf.Root().loadSync(
    PROTO_FILES.map(file => path.join(dir, file)),
    { keepCase: true }
  );
  root.resolveAll();
  logger.debug('Loaded wire schema', { dir, files: PROTO_FILES.length });
  cachedRoot = root;
  return root;
}

export function messageType(name: MessageTypeName): Type {
  return loadSchema().lookupType(name);
}

/** Forgets the loaded schema so the next lookup reads the directory again. Tests only. */
export function resetSchemaForTesting(): void {
  cachedRoot = null;
}
