#!/usr/bin/env node

import { run } from '@stricli/core';
import { app } from './cli.js';

await run(app, process.argv.slice(2), { process });
