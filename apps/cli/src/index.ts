#!/usr/bin/env tsx
import dotenv from 'dotenv';
import { main } from './main.js';

dotenv.config();

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
