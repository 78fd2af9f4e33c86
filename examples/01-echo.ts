/**
 * Basic Usage - connect with environment configuration and echo a value
 *
 *   ISABELLE_PORT=4711 ISABELLE_PASSWORD=... npx tsx examples/01-echo.ts
 */
import { IsabelleClient, loadConfig, unwrapSync } from '../src';

async function main(): Promise<void> {
  const client = IsabelleClient.fromConfig(loadConfig());

  const result = await client.echo('hello');
  if (result.kind === 'ok') {
    console.log('Echoed:', result.value);
  } else {
    console.error('Echo failed:', result.error);
  }

  // Throws instead of returning the error outcome
  console.log('Again:', unwrapSync(await client.echo('again')));
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
