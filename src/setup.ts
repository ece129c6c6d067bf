#!/usr/bin/env node
/**
 * Setup procedure entry point.
 *
 * Bundled to bundle/setup.mjs, which is the script the launcher downloads and
 * runs. Configures git, SSH keys and connectivity on the current workstation.
 *
 * @module setup
 */

import process from 'node:process'
import {runSetupCli} from './lib/setup/setup.js'

process.exitCode = await runSetupCli()
