/**
 * Jest setup file to suppress verbose console output.
 *
 * Jest's console prints a stack trace under every console.log/error call.
 * Swapping in Node's console keeps log lines on one line each.
 */
import nodeConsole from 'console';

global.console = nodeConsole;
