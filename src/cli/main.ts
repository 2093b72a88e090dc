#!/usr/bin/env node

import {
  CONFIG_ERROR,
  CONFIG_LOADED,
  SERVICE_STOPPED,
} from '../library/@log/index.js';
import {
  LogTelemetry,
  Logs,
  METRIC_PREFIX,
  MetricsServer,
  ServiceBuilder,
} from '../library/index.js';

import type {LoadedConfig} from './@config.js';
import {loadConfig} from './@config.js';
import {EXIT_SIGNALS} from './@constants.js';

const configPath = process.argv[2] as string | undefined;

let loaded: LoadedConfig;

try {
  loaded = await loadConfig(configPath);
} catch (error) {
  Logs.error('config', CONFIG_ERROR(error));
  process.exit(1);
}

const {config, filepath} = loaded;

Logs.info('config', CONFIG_LOADED(filepath));

const controller = new AbortController();

for (const signal of EXIT_SIGNALS) {
  process.once(signal, () =>
    controller.abort(new Error(`Received ${signal}.`)),
  );
}

const telemetry = new LogTelemetry({prefix: METRIC_PREFIX});

let metricsServer: MetricsServer | undefined;

if (config.metrics) {
  metricsServer = new MetricsServer(telemetry.registry, config.metrics);
  await metricsServer.listen();
}

const service = new ServiceBuilder(config).telemetry(telemetry).build();

try {
  await service.run(controller.signal);
} catch (error) {
  if (!controller.signal.aborted) {
    throw error;
  }

  Logs.info('service', SERVICE_STOPPED);
} finally {
  await metricsServer?.close();
}
