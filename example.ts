import { array, boolean, duration, int, load, map, record, string, uint16, unused } from './src/index';

const server = record({
  host: string().required(),
  port: uint16().default('8080'),
});

const spec = record({
  debug: boolean(),
  logLevel: string().splitWords().default('info'),
  timeout: duration().default('30s'),
  adminUsers: array(string()),
  colorCodes: map(string(), int()),
  apiKey: string().fromEnv('SERVICE_API_KEY').required(),
  servers: array(server),
});

export const config = load(spec, { prefix: 'myapp', envFile: '.env' });

for (const key of unused(spec, { prefix: 'myapp' })) {
  console.warn(`Environment variable '${key}' is not used by any field.`);
}
