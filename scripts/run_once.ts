import { EnvSecretStore, PIPELINE_KINDS, createOrchestrator, loadConfig } from '../ingest/index';

// Usage: tsx scripts/run_once.ts <batched|per-call>
const requested = process.argv[2] ?? 'batched';
const pipeline = PIPELINE_KINDS.find((kind) => kind === requested);

if (!pipeline) {
    console.error(`Unknown pipeline "${requested}". Expected one of: ${PIPELINE_KINDS.join(', ')}`);
    process.exit(2);
}

const config = loadConfig(process.env);
const orchestrator = createOrchestrator(config, new EnvSecretStore(process.env, config.secrets.vault));
const report = await orchestrator.run(pipeline);

console.log(JSON.stringify(report, null, 2));
process.exitCode = report.status === 'TOTAL_FAILURE' ? 1 : 0;
