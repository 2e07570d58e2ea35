/**
 * Main entry point for the livens CLI application.
 */
/// <reference types="node" />
import { main } from './index';

// Export the main function for programmatic use
export { main };

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
