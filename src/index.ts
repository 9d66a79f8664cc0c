// Load environment variables first
import 'dotenv/config';

import type { Server } from 'node:http';
import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { ConfigError } from './utils/errors.js';
import { MmcliModemAdapter } from './adapters/modem/MmcliModemAdapter.js';
import { SmtpMailAdapter } from './adapters/mail/SmtpMailAdapter.js';
import { loadBlacklist } from './core/filter/Blacklist.js';
import { MailDelivery } from './core/relay/MailDelivery.js';
import { InboxPoller } from './core/relay/InboxPoller.js';
import { startHealthServer } from './server.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  const config = loadConfig();
  logger.info('Starting SMS mail relay');

  const modemAdapter = new MmcliModemAdapter({
    modemId: config.modemId,
    idScheme: config.smsIdScheme,
  });
  if (config.modemId === 'auto') {
    const modemId = await modemAdapter.discoverModem();
    if (modemId === null) {
      throw new ConfigError('MODEM_ID is "auto" but no modem was found');
    }
    modemAdapter.selectModem(modemId);
  }

  const blacklist = await loadBlacklist(config.blacklistPath);

  const mailAdapter = new SmtpMailAdapter({
    host: config.smtpHost,
    port: config.smtpPort,
    username: config.smtpUsername,
    password: config.smtpPassword,
    tls: config.smtpTls,
  });
  logger.info(
    { recipients: config.smtpRecipients, host: config.smtpHost, port: config.smtpPort },
    'Loaded SMTP settings'
  );
  try {
    await mailAdapter.verify();
  } catch (error) {
    // Deliveries retry on their own; an unreachable server at startup is not fatal
    logger.warn({ error }, 'SMTP server verification failed');
  }

  const delivery = new MailDelivery(mailAdapter, {
    sender: config.smtpSender,
    recipients: config.smtpRecipients,
    subjectTemplate: config.smtpSubject,
  });
  const poller = new InboxPoller(
    { modemPort: modemAdapter, blacklist, delivery },
    {
      pollIntervalSeconds: config.pollInterval,
      deleteAfterProcessing: config.deleteSms,
      ignoreExisting: config.ignoreExistingSms,
    }
  );

  let server: Server | undefined;
  if (config.healthPort !== undefined) {
    server = await startHealthServer(() => poller.getStatus(), config.healthPort, config.host);
  }

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Shutting down');
    controller.abort();
    server?.close();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await poller.run(controller.signal);
}

main().catch((error) => {
  logger.fatal({ error }, 'Failed to start SMS mail relay');
  process.exit(1);
});
