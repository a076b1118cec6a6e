#!/usr/bin/env node
/**
 * dirapps CLI entrypoint
 */

import './cli.js';
