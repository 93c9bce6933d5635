#!/usr/bin/env node
/**
 * Context-Recall Assistant - Main Entry Point
 * Readline chat loop over persisted, relevance-selected conversations
 */

import * as readline from 'readline';
import { parseCommand, HELP_TEXT } from './cli/commands.js';
import { CONFIG } from './config.js';
import { AssistantError } from './errors.js';
import { ChatAssistant } from './services/assistant.js';
import { ConversationStore } from './services/conversation-store.js';
import type { ConversationSession } from './services/conversation-session.js';
import { ApiCredential } from './services/credentials.js';
import { OpenAIEmbeddingBackend, OpenAIModelClient } from './services/openai-clients.js';
import { TitleGenerator } from './services/title-generator.js';
import { TokenAccountant } from './services/token-accountant.js';
import { createLogger, describeError } from './utils/logger.js';
import { TiktokenTokenizer } from './utils/token-counter.js';

const logger = createLogger('cli', CONFIG.LOG_LEVEL ?? (CONFIG.DEBUG ? 'debug' : undefined));

function createAssistant(credential: ApiCredential): ChatAssistant {
  const modelClient = new OpenAIModelClient({ credential });
  return new ChatAssistant({
    store: new ConversationStore(CONFIG.DATA_DIR, logger.child('store')),
    defaults: {
      model: CONFIG.MODEL,
      temperature: CONFIG.TEMPERATURE,
      maxTokens: CONFIG.MAX_TOKENS,
      systemDirective: CONFIG.SYSTEM_DIRECTIVE,
      recencyWindow: CONFIG.RECENCY_WINDOW
    },
    session: {
      modelClient,
      embeddingBackend: new OpenAIEmbeddingBackend({ credential }, CONFIG.EMBEDDING_MODEL),
      accountant: new TokenAccountant({
        tokenizer: new TiktokenTokenizer(),
        messageOverhead: CONFIG.MESSAGE_TOKEN_OVERHEAD,
        responseReservePct: CONFIG.RESPONSE_RESERVE_PCT,
        safetyMarginPct: CONFIG.BUDGET_SAFETY_MARGIN_PCT
      }),
      retry: {
        maxRetries: CONFIG.MAX_RETRIES,
        baseDelayMs: CONFIG.RETRY_BASE_DELAY_MS,
        maxDelayMs: CONFIG.RETRY_MAX_DELAY_MS
      },
      titleGenerator: new TitleGenerator(modelClient),
      titleAfterExchanges: CONFIG.TITLE_AFTER_EXCHANGES,
      logger: logger.child('session')
    }
  });
}

function formatError(error: unknown): string {
  if (error instanceof AssistantError) {
    const hint = error.retryable ? ' (temporary, try again)' : '';
    return `❌ ${error.message}${hint}`;
  }
  return `❌ Unexpected error: ${describeError(error)}`;
}

async function main() {
  // Validate environment
  const credential = ApiCredential.fromEnv(process.env);
  if (!credential) {
    console.error('Error: OPENAI_API_KEY not found in environment variables');
    console.error('Please create a .env file with your OpenAI API key');
    process.exit(1);
  }

  const assistant = createAssistant(credential);
  let session: ConversationSession = assistant.createSession();

  console.log('Context-Recall Assistant');
  console.log('========================');
  console.log(`Model: ${CONFIG.MODEL} | Recency window: ${CONFIG.RECENCY_WINDOW} | Data: ${CONFIG.DATA_DIR}`);
  console.log('Type /help for commands, "exit" to quit');
  console.log(`Conversation: ${session.id}`);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout
  });

  const askQuestion = (query: string): Promise<string> => {
    return new Promise(resolve => rl.question(query, resolve));
  };

  // Chat loop
  while (true) {
    const command = parseCommand(await askQuestion('\nYou: '));

    try {
      switch (command.kind) {
        case 'exit':
          await assistant.close();
          rl.close();
          console.log('\nGoodbye!');
          return;
        case 'empty':
          break;
        case 'help':
          console.log(HELP_TEXT);
          break;
        case 'invalid':
          console.log(command.reason);
          break;
        case 'new':
          session = assistant.createSession();
          console.log(`Started conversation ${session.id}`);
          break;
        case 'list': {
          const summaries = await assistant.listSessions();
          if (summaries.length === 0) {
            console.log('No saved conversations');
          }
          for (const summary of summaries) {
            const updated = new Date(summary.updatedAt).toLocaleString();
            console.log(`${summary.id}  ${summary.title}  (${summary.messageCount} messages, ${updated})`);
          }
          break;
        }
        case 'load':
          session = await assistant.loadSession(command.sessionId);
          console.log(`Loaded "${session.title}" (${session.log.length} messages)`);
          break;
        case 'title':
          await assistant.renameSession(session.id, command.title);
          console.log(`Renamed to "${session.title}"`);
          break;
        case 'set': {
          const parameters = await assistant.updateParameters(session.id, command.patch);
          console.log(`Parameters: ${JSON.stringify({ ...parameters, systemDirective: undefined })}`);
          break;
        }
        case 'archive':
          await assistant.archiveSession(session.id);
          session = assistant.createSession();
          console.log(`Archived. Started conversation ${session.id}`);
          break;
        case 'message': {
          // Ctrl+C while waiting cancels the request, not the program
          const controller = new AbortController();
          const cancel = () => controller.abort();
          rl.once('SIGINT', cancel);
          let reply: string;
          try {
            reply = await assistant.submit(session.id, command.text, { signal: controller.signal });
          } finally {
            rl.off('SIGINT', cancel);
          }
          console.log(`\nAssistant: ${reply}`);
          console.log(`[${session.runningTokenCount} tokens in history | ${session.title}]`);
          break;
        }
      }
    } catch (error) {
      logger.debug('Command failed', { command: command.kind, error: describeError(error) });
      console.error('\n' + formatError(error));
    }
  }
}

// Run the application
main().catch(error => {
  console.error('Fatal error:', error);
  process.exit(1);
});
