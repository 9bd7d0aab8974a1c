#!/usr/bin/env node
// src/bin/md2po2md.ts - md2po2md executable
import { createMd2po2mdProgram } from '../cli/md2po2md.js';

await createMd2po2mdProgram().parseAsync();
