import { config as loadDotenv } from 'dotenv';
import { consoleIO, createCliContext } from './context';
import { run } from './program';

loadDotenv();

process.exitCode = await run(
  process.argv.slice(2),
  createCliContext({ io: consoleIO, cwd: process.cwd(), env: process.env })
);
