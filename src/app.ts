#!/usr/bin/env node
import { main } from "./cli.js";

process.exit(main(process.argv.slice(2), console, process.env));
