#!/usr/bin/env tsx

/**
 * Runner for the drafting pipeline
 * Loads environment variables and executes one drafting run
 */

import dotenv from 'dotenv';
import path from 'path';
import { executeCli } from '../src/pipeline/cli';
import { logger } from '../src/utils/logger';

// .env.local wins over .env; variables already set in the environment win over both
dotenv.config({ path: path.join(process.cwd(), '.env.local') });
dotenv.config({ path: path.join(process.cwd(), '.env') });

async function main() {
  try {
    process.exitCode = await executeCli();
  } catch (error) {
    logger.error('Drafting run failed', error);
    process.exitCode = 1;
  }
}

void main();
