import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Logger } from '@nestjs/common';
import axios from 'axios';
import { CASES, isExpectedStatus } from './smoke-cases';

// Hits a running server and saves each chart it returns.
//   SMOKE_BASE_URL=http://localhost:8080 BASIC_AUTH_PASSWORD=... npm run smoke

const OUTPUT_DIR = 'smoke-output';

async function run(): Promise<number> {
  const logger = new Logger('Smoke');
  const baseURL = process.env.SMOKE_BASE_URL || 'http://localhost:8080';
  const username = process.env.BASIC_AUTH_USERNAME || 'admin';
  const password = process.env.BASIC_AUTH_PASSWORD ?? '';

  await mkdir(OUTPUT_DIR, { recursive: true });
  const client = axios.create({ baseURL, responseType: 'arraybuffer', validateStatus: () => true });

  let failures = 0;
  for (const c of CASES) {
    const res = await client.get<ArrayBuffer>('/', {
      params: c.params,
      auth: c.auth === false ? undefined : { username, password },
    });
    const body = Buffer.from(res.data);

    if (res.status === 200) {
      const file = join(OUTPUT_DIR, `${c.name}.png`);
      await writeFile(file, body);
      logger.log(`${c.name}: 200 (${body.length} bytes) -> ${file}`);
    } else {
      logger.log(`${c.name}: ${res.status} ${body.toString('utf8')}`);
    }

    if (!isExpectedStatus(c, res.status)) {
      failures++;
      logger.error(`${c.name}: expected ${c.expectStatus.join(' or ')}, got ${res.status}`);
    }
  }
  return failures;
}

run()
  .then((failures) => {
    process.exitCode = failures > 0 ? 1 : 0;
  })
  .catch((err: unknown) => {
    new Logger('Smoke').error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
