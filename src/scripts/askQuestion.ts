import "dotenv/config";
import { createDefaultQueryEngine } from "../app/container.js";
import { getUserMessage, wrapError } from "../lib/errors.js";
import { parseSourceSelection } from "../query/sourceResolver.js";

/**
 * Ask one question from the command line.
 *
 *   askQuestion <userId> "<question>" [source_type] [source_id]
 */
async function main() {
  const [userId, question, sourceType, sourceId] = process.argv.slice(2);
  if (!userId || !question) {
    console.error('Usage: askQuestion <userId> "<question>" [all|document|email_type] [source_id]');
    process.exit(1);
  }

  const parsed = parseSourceSelection({ source_type: sourceType, source_id: sourceId });
  if (!parsed.ok) {
    console.error(`❌ ${parsed.code}: ${parsed.reason}`);
    process.exit(1);
  }

  const engine = createDefaultQueryEngine();

  try {
    const response = await engine.answerQuestion(question, userId, parsed.scope);
    console.log(`\n${response.answer}\n`);
    console.log(`Outcome: ${response.outcome} (${response.elapsedMs}ms)`);
    if (response.sources.length > 0) {
      console.log("Sources:");
      for (const source of response.sources) {
        console.log(`  [${source.kind}] ${source.label}`);
      }
    }
  } catch (err) {
    console.error(`❌ ${getUserMessage(wrapError(err))}`);
    process.exit(1);
  }
}

main().catch(console.error);
