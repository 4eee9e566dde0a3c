import { Command } from 'commander';
import { getPackageInfo } from '../index.js';
import { handleCreateCertificateCommand } from './commands/create-certificate.js';
import { handleInspectCommand } from './commands/inspect.js';
import { handleDecodeNameCommand, handleEncodeNameCommand } from './commands/names.js';
import { handleError } from './utils/errors.js';

/** Build a Commander program instance for the oidc-tls-transport CLI. */
export function createCli(): Command {
  const program = new Command();
  const pkg = getPackageInfo();

  program
    .name('oidc-tls-transport')
    .description('Inspect TLS client certificates and managed transport names')
    .version(pkg.version);

  // In test mode override default exit (help, errors) to throw instead of process.exit
  if (process.env.OIDC_TLS_CLI_TEST) {
    program.exitOverride();
  }

  // Helper deciding whether to exit (skip during tests)
  function exitOnError() {
    if (process.env.OIDC_TLS_CLI_TEST) return;
    process.exit(1);
  }

  program
    .command('inspect')
    .description('Show whether a certificate can be used for TLS client authentication')
    .argument('<certificate>', 'Path to a PEM certificate')
    .action((certificate: string) => {
      try {
        handleInspectCommand({ certificate });
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  program
    .command('encode-name')
    .description('Print the transport name used for a client registration')
    .argument('<registrationId>', 'Client registration identifier')
    .option('--tls', 'Attach a CA-issued certificate (tls_client_auth)')
    .option('--self-signed', 'Attach a self-signed certificate (self_signed_tls_client_auth)')
    .option('--prefix <prefix>', 'Transport name prefix')
    .option('-p, --property <keyValue...>', 'Additional key=value properties')
    .action(
      (
        registrationId: string,
        opts: { tls?: boolean; selfSigned?: boolean; prefix?: string; property?: string[] },
      ) => {
        try {
          handleEncodeNameCommand({ registrationId, ...opts });
        } catch (e) {
          handleError(e);
          exitOnError();
        }
      },
    );

  program
    .command('decode-name')
    .description('Print the properties carried by a transport name (\\u001e/\\u001f escapes allowed)')
    .argument('<name>', 'Transport name')
    .option('--prefix <prefix>', 'Transport name prefix')
    .action((name: string, opts: { prefix?: string }) => {
      try {
        handleDecodeNameCommand({ name, prefix: opts.prefix });
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  program
    .command('create-certificate')
    .description('Create a self-signed certificate for self_signed_tls_client_auth')
    .requiredOption('-s, --subject <dn>', 'Subject distinguished name, e.g. "CN=my-client"')
    .option('-o, --output <path>', 'Output directory', './certificates')
    .option('--algo <algo>', 'Key algorithm', 'ec-p256')
    .option('--days <days>', 'Validity period in days', '365')
    .option('--force', 'Overwrite existing files')
    .action(
      async (opts: {
        subject: string;
        output: string;
        algo?: string;
        days?: string;
        force?: boolean;
      }) => {
        try {
          await handleCreateCertificateCommand(opts);
        } catch (e) {
          handleError(e);
          exitOnError();
        }
      },
    );

  return program;
}

/** For tests: parse arguments and return the program (no automatic exit). */
export async function runCli(argv: string[]): Promise<Command> {
  const program = createCli();
  await program.parseAsync(argv, { from: 'user' });
  return program;
}
