#!/usr/bin/env node
/**
 * release-antecedent CLI entrypoint
 *
 * Imports the CLI module, which parses arguments and runs the command.
 */

import './cli.js';
