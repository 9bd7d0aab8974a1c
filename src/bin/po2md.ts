#!/usr/bin/env node
// src/bin/po2md.ts - po2md executable
import { createPo2mdProgram } from '../cli/po2md.js';

await createPo2mdProgram().parseAsync();
