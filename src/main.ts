#!/usr/bin/env node

import { createProgram } from './cli.js';

createProgram().parse();
