#!/usr/bin/env tsx
import { setupCLI } from "./cli/index.tsx";

await setupCLI().parseAsync(process.argv);
