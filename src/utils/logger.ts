import { Console } from 'console';

/**
 * Diagnostic console. stdout carries protocol lines only, so every
 * human-readable message goes to stderr.
 */
export const logger = new Console({ stdout: process.stderr, stderr: process.stderr });
