#!/usr/bin/env node
import { handleCommandError } from "./context.js";
import { createProgram } from "./program.js";

createProgram().parseAsync().catch(handleCommandError);
