import { existsSync } from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';

export const loadEnv = () => {
  const cwd = process.cwd();
  const candidates = [
    path.resolve(cwd, '.env.local'),
    path.resolve(cwd, '../../.env.local'),
    path.resolve(cwd, '.env'),
    path.resolve(cwd, '../../.env'),
  ];

  const envPath = candidates.find((candidate) => existsSync(candidate));
  if (envPath) {
    dotenv.config({ path: envPath });
  } else {
    dotenv.config();
  }
};
