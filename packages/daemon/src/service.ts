import { LauncherDaemon, type LauncherDaemonOptions } from '@swiftlaunch/core';
import { RequestHandler } from './handler';
import { IpcServer } from './server';

export interface DaemonService {
  daemon: LauncherDaemon;
  server: IpcServer;
  stop(): Promise<void>;
}

/**
 * Builds the daemon, binds its socket and runs the first scan. The socket is
 * bound before scanning so a second daemon fails fast with a DaemonBindError.
 */
export async function startDaemonService(options: LauncherDaemonOptions): Promise<DaemonService> {
  const daemon = await LauncherDaemon.create(options);
  const server = new IpcServer({
    socketPath: options.paths.socketPath,
    handler: new RequestHandler(daemon, options.logger),
    logger: options.logger,
  });

  try {
    await server.listen();
  } catch (err) {
    await daemon.stop();
    throw err;
  }
  await daemon.start();

  return {
    daemon,
    server,
    stop: async () => {
      await server.close();
      await daemon.stop();
    },
  };
}
