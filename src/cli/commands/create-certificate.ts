import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { createClientCertificate } from '../../index.js';
import { kv, render } from '../logger.js';
import { parseAlgorithm } from '../utils/algorithms.js';

/** Options accepted by the create-certificate command. */
export interface CreateCertificateOptions {
  subject: string;
  output: string;
  algo?: string;
  days?: string;
  force?: boolean;
}

/** Generate a self-signed certificate for self_signed_tls_client_auth. */
export async function handleCreateCertificateCommand(options: CreateCertificateOptions) {
  const certPath = join(options.output, 'client-cert.pem');
  const keyPath = join(options.output, 'client-key.pem');

  if (!options.force && (existsSync(certPath) || existsSync(keyPath))) {
    throw new Error(`Certificate files already exist in ${options.output} (use --force to overwrite)`);
  }

  const validityDays = options.days ? Number.parseInt(options.days, 10) : 365;
  if (!Number.isInteger(validityDays) || validityDays <= 0) {
    throw new Error(`Invalid validity period: ${options.days}`);
  }

  const result = await createClientCertificate({
    subject: options.subject,
    algorithm: parseAlgorithm(options.algo ?? 'ec-p256'),
    validityDays,
  });

  mkdirSync(options.output, { recursive: true });
  writeFileSync(certPath, result.pem);
  writeFileSync(keyPath, result.privateKeyPem, { mode: 0o600 });

  render.success('Self-signed client certificate created');
  kv('Certificate', certPath);
  kv('Private key', keyPath);
}
