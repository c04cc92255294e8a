// Centralized environment bootstrap so any entrypoint can import once.
// Usage: import './env_bootstrap.js'; at the top of entrypoints, before loadConfig().
import 'dotenv/config';
