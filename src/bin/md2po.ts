#!/usr/bin/env node
// src/bin/md2po.ts - md2po executable
import { createMd2poProgram } from '../cli/md2po.js';

await createMd2poProgram().parseAsync();
