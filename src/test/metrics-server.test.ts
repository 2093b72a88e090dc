import {LogTelemetry, MetricsServer} from '../library/index.js';
import {Port} from '../library/x.js';

const HOST = '127.0.0.1';
const PORT = Port.nominalize(39091);

const METRICS_URL = `http://${HOST}:${PORT}/metrics`;

let servers: MetricsServer[] = [];

beforeEach(() => {
  vi.spyOn(console, 'info').mockImplementation(() => {});
});

afterEach(async () => {
  await Promise.all(servers.map(server => server.close()));
  servers = [];

  vi.restoreAllMocks();
});

function createServer(telemetry: LogTelemetry): MetricsServer {
  const server = new MetricsServer(telemetry.registry, {host: HOST, port: PORT});
  servers.push(server);
  return server;
}

test('serve the registry on /metrics', async () => {
  const telemetry = new LogTelemetry({prefix: 'dynsync_'});

  telemetry
    .counter('updates_total', 'Host updates.')
    .add({signal: new AbortController().signal}, 3);

  await createServer(telemetry).listen();

  expect(console.info).toHaveBeenCalledWith(
    '[metrics]',
    `serving metrics on http://${HOST}:${PORT}/metrics...`,
  );

  const response = await fetch(METRICS_URL);

  expect(response.status).toBe(200);

  const contentType = response.headers.get('content-type');

  expect(contentType?.startsWith('text/plain')).toBe(true);
  expect(contentType).toContain('version=0.0.4');

  expect(await response.text()).toBe(
    [
      '# HELP dynsync_updates_total Host updates.',
      '# TYPE dynsync_updates_total counter',
      'dynsync_updates_total 3',
      '',
    ].join('\n'),
  );
});

test('listen rejects when the port is taken', async () => {
  const telemetry = new LogTelemetry();

  await createServer(telemetry).listen();

  await expect(createServer(telemetry).listen()).rejects.toMatchObject({
    code: 'EADDRINUSE',
  });
});

test('close stops serving', async () => {
  const server = createServer(new LogTelemetry());

  await expect(server.close()).resolves.toBeUndefined();

  await server.listen();

  await expect(server.close()).resolves.toBeUndefined();
  await expect(server.close()).resolves.toBeUndefined();

  await expect(fetch(METRICS_URL)).rejects.toThrow();
});
