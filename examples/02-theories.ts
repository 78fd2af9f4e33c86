/**
 * Sessions and Theories - start a server, check a theory, stop everything
 *
 *   npx tsx examples/02-theories.ts
 */
import { IsabelleClient, OptionsBuilder, runServer, unwrapAsync, useTheoriesArgs } from '../src';

async function main(): Promise<void> {
  const server = await runServer({ name: 'examples' });
  const client = IsabelleClient.forServer(server, { logLevel: 'info' });

  try {
    const options = new OptionsBuilder().threads(2).quickAndDirty(true);
    const started = unwrapAsync(
      await client.sessionStart(
        { session: 'HOL', options: options.toServerOptions() },
        { onNote: (note) => console.log('[start]', note.message ?? note) }
      )
    );

    const result = await client.useTheories(useTheoriesArgs(started.session_id, ['Scratch'], { master_dir: __dirname }), {
      onNote: (note) => console.log('[check]', note.percentage ?? note.message),
    });
    if (result.kind === 'finished') {
      for (const node of result.value.nodes) {
        console.log(node.theory_name, node.status.ok ? 'ok' : 'failed');
      }
    } else if (result.kind === 'failed') {
      console.error('Task failed:', result.failure.message.message);
    }

    await client.sessionStop({ session_id: started.session_id });
  } finally {
    await server.exit();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
