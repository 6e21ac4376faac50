import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { readBenchEnv } from './env';
import { formatResult, runIncrementorBench } from './runner';

async function main() {
  const { output, ...config } = readBenchEnv(process.env);

  console.log(
    `Generating sequence values=${config.values} range=[${config.min}, ${config.max}) offset=${config.offset} seed=${config.seed}`
  );
  const result = runIncrementorBench(config);
  for (const entry of result.results) {
    console.log(formatResult(entry));
  }

  if (output) {
    await mkdir(dirname(output), { recursive: true });
    await writeFile(output, JSON.stringify(result, null, 2));
    console.log(`Wrote results to ${output}`);
  }
}

void main().catch((error: unknown) => {
  console.error('Benchmark failed', error);
  process.exitCode = 1;
});
