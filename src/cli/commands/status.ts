import { parseArgs } from 'node:util';
import { AdvisorConfigSchema } from '../../config/schema.js';
import { ADVISOR_VERSION } from '../../version.js';
import { COMMON_OPTIONS, initializeForQueries, withAdvisor, type CommandOptions } from '../context.js';
import { printKeyValue } from '../progress.js';

export async function statusCommand(options: CommandOptions): Promise<void> {
  const { values } = parseArgs({
    args: options.rawArgs.slice(1),
    options: COMMON_OPTIONS,
    allowPositionals: false,
    strict: true,
  });

  await withAdvisor(options, undefined, async (session) => {
    const state = await initializeForQueries(session);
    const backend = session.advisor.facade.describeBackend();
    const parsed = AdvisorConfigSchema.safeParse(session.config);
    const provider = parsed.success ? parsed.data.preferredProvider : 'invalid';

    if (values.json) {
      console.log(JSON.stringify({ version: ADVISOR_VERSION, provider, state, backend }, null, 2));
      return;
    }

    console.log('Fiqh Advisor Status');
    console.log('===================\n');
    printKeyValue([
      { key: 'Version', value: ADVISOR_VERSION },
      { key: 'Provider', value: provider },
      { key: 'Lifecycle', value: state.status },
      { key: 'Mode', value: backend.mode },
      { key: 'Agent', value: backend.agent },
      { key: 'Real AI', value: backend.usingRealAi },
      { key: 'Network', value: backend.network ?? null },
    ]);
    if (state.status === 'degraded') {
      console.log(`\nDegraded: ${state.reason.message}`);
    } else if (state.status === 'failed') {
      console.log(`\nFailed: ${state.error.message}`);
    }
  });
}
