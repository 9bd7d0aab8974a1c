#!/usr/bin/env node
// src/bin/mdpo2html.ts - mdpo2html executable
import { createMdpo2htmlProgram } from '../cli/mdpo2html.js';

await createMdpo2htmlProgram().parseAsync();
