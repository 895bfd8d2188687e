#!/usr/bin/env node
/**
 * notification-osd - Desktop notification OSD for mpv
 *
 * Attaches to a running player through its JSON IPC socket and mirrors the
 * playback state into a single freedesktop notification.
 *
 * USAGE:
 *   mpv --input-ipc-server=/tmp/mpvsocket file.mkv &
 *   notification-osd [--socket PATH] [--client-name NAME] [--settings FILE]
 *
 * SIGNALS:
 *   SIGHUP           re-read the option file
 *   SIGINT, SIGTERM  close the notification and exit
 */

import { MpvIpcClient } from './backends/mpv-ipc-client';
import { NotifySendBackend } from './backends/notify-send-backend';
import { ScreenshotCapture } from './backends/screenshot-capture';
import { type CliArgs, CliUsageError, optionFilePath, parseCliArgs, resolveSettings } from './config/daemon-settings';
import { OsdEngine } from './engine/osd-engine';
import { Logger } from './lib/logger';
import { OptionStore } from './lib/option-store';
import { SignalChannel } from './lib/signal-channel';

const USAGE = `Usage: notification-osd [options]

Options:
  --socket PATH        mpv IPC socket (default /tmp/mpvsocket)
  --client-name NAME   name used for the option file and script messages
                       (default notification_osd)
  --settings FILE      settings file (default ~/.config/mpv-osd-notifier/settings.yaml)
  -h, --help           show this help
`;

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`${error.message}\n\n${USAGE}`);
      process.exit(2);
    }
    throw error;
  }

  if (args.help) {
    process.stdout.write(USAGE);
    return;
  }

  const { settings, warnings } = resolveSettings(args);
  const logger = new Logger({ clientName: settings.clientName, logFile: settings.logFile });
  for (const warning of warnings) {
    logger.error(warning);
  }

  const channel = new SignalChannel();
  const ipc = new MpvIpcClient({
    socketPath: settings.socket,
    clientName: settings.clientName,
    channel,
    logger
  });

  try {
    await ipc.connect();
  } catch (error) {
    logger.error(`could not connect to ${settings.socket}`, error);
    process.exit(1);
  }

  try {
    logger.applyMsgLevel(await ipc.getProperty('msg-level'));
  } catch (error) {
    logger.verbose(`msg-level unavailable: ${error instanceof Error ? error.message : String(error)}`);
  }

  const engine = new OsdEngine({
    player: ipc,
    capture: new ScreenshotCapture({ source: ipc, channel, logger, cacheDir: settings.cacheDir }),
    presentation: new NotifySendBackend({ logger, cacheDir: settings.cacheDir }),
    channel,
    options: new OptionStore({
      clientName: settings.clientName,
      logger,
      configPath: optionFilePath(settings)
    }),
    logger
  });

  process.on('SIGHUP', () => channel.push({ kind: 'config-reload-requested' }));
  process.on('SIGINT', () => channel.close('interrupted'));
  process.on('SIGTERM', () => channel.close('terminated'));

  engine.start();
  logger.verbose(`attached to ${settings.socket}`);

  try {
    await engine.run();
  } finally {
    ipc.close();
  }
}

main().catch(error => {
  process.stderr.write(`notification-osd: fatal: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
