// Centralized environment bootstrap so any script/test can import once.
// Usage: import './env_bootstrap.js'; near the top of entrypoints.
import 'dotenv/config';

if (!process.env.GEMINI_API_KEY) {
  console.warn('[env] GEMINI_API_KEY not set – wage suggestions are disabled.');
}
