#!/usr/bin/env node
/**
 * Launcher entry point.
 *
 * Downloads the setup script to a temporary file, runs it attached to the
 * terminal and exits with its status.
 *
 * @module launch
 */

import process from 'node:process'
import {runLauncherCli} from './lib/launcher/launcher.js'

process.exitCode = await runLauncherCli()
