/**
 * Clinical Trials Query Agent
 * ---------------------------
 * Chat front-end for a clinical-trials search API: a language model turns each
 * question into search filters, the filters accumulate per conversation, and
 * results come back as markdown with phase / more results / location refinements.
 *
 * HOW TO USE
 * 1) `npm install && npm run build`
 * 2) Set env vars:
 *    - TRIALS_API_URL, TRIALS_API_KEY   (search endpoint)
 *    - OPENAI_API_KEY                   (parameter extraction)
 *    - optional: OPENAI_MODEL, OPENAI_BASE_URL, PORT, DEFAULTS_PROFILE=classic|broad,
 *      TRANSCRIPT_WINDOW, SEARCH_TIMEOUT_MS, ORACLE_TIMEOUT_MS, SESSION_IDLE_MS, MAX_SESSIONS
 * 3) `npm start`, then POST JSON-RPC to http://localhost:8788/agent
 *    e.g. {"jsonrpc":"2.0","id":1,"method":"tools/call","params":{"name":"session.create"}}
 */

import { createApp, RPC_PATH } from './src/agent/app.js';
import { makeOpenAiOracle } from './src/agent/clients/openai_oracle.js';
import { makeTrialsClient } from './src/agent/clients/trials_client.js';
import { loadConfig, type AgentConfig } from './src/agent/config.js';
import { ConfigError } from './src/agent/errors.js';
import { SessionStore } from './src/agent/session_store.js';
import { buildTools } from './src/agent/tools.js';

// -------- Config --------
function readConfig(): AgentConfig {
  try {
    return loadConfig();
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(e.message);
      process.exit(1);
    }
    throw e;
  }
}

const config = readConfig();

// -------- Wiring --------
const oracle = makeOpenAiOracle({
  apiKey: config.openaiApiKey,
  model: config.openaiModel,
  timeoutMs: config.oracleTimeoutMs,
  baseURL: config.openaiBaseUrl,
});

const trials = makeTrialsClient({
  baseUrl: config.trialsApiUrl,
  apiKey: config.trialsApiKey,
  timeoutMs: config.searchTimeoutMs,
});

const store = new SessionStore(
  { oracle, trials },
  { profile: config.defaultsProfile, transcriptWindow: config.transcriptWindow },
  { idleMs: config.sessionIdleMs, maxSessions: config.maxSessions }
);

const app = createApp({ tools: buildTools(store), store });

app.listen(config.port, () => console.log(`Trials agent listening on http://localhost:${config.port}${RPC_PATH}`));
