import { readFileSync } from 'fs';
import { inspectCertificate, loadCertificate } from '../../index.js';
import { heading, kv, render } from '../logger.js';

/** Options accepted by the inspect command. */
export interface InspectOptions {
  certificate: string;
}

function yesNo(value: boolean): string {
  return value ? 'yes' : 'no';
}

/** Print the attributes that decide whether a certificate can be used for TLS client auth. */
export function handleInspectCommand(options: InspectOptions) {
  const certificate = loadCertificate(readFileSync(options.certificate, 'utf-8'), options.certificate);
  const report = inspectCertificate(certificate);

  heading('Certificate');
  kv('Subject', report.subject);
  kv('Issuer', report.issuer);
  kv('Serial number', report.serialNumber);
  kv('Valid', `${report.notBefore.toISOString()} → ${report.notAfter.toISOString()}`);
  kv('Version', `v${report.version}`);
  kv('Self-issued', yesNo(report.selfIssued));
  kv('Digital signature key usage', yesNo(report.digitalSignature));
  kv('Client authentication EKU', yesNo(report.clientAuthentication));

  heading('Eligible client authentication methods');
  if (report.eligibleMethods.length === 0) {
    render.warn('none');
  } else {
    render.list(report.eligibleMethods);
  }
}
