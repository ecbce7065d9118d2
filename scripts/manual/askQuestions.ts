import { loadConfig } from "../../src/config/env";
import { withSession } from "../../src/session";
import { buildLawAgent } from "../../src/agent/lawAgent";
import { describeError } from "../../src/utils";

async function main() {
  const questions = process.argv
    .slice(2)
    .map((value) => value.replace(/^"+/, "").replace(/"+$/, "").trim())
    .filter((value) => value.length > 0);

  if (questions.length === 0) {
    console.error('Usage: ts-node scripts/manual/askQuestions.ts "<question>" ["<question>" ...]');
    process.exit(1);
  }

  const config = loadConfig();
  const results = await withSession(config, (session) =>
    buildLawAgent(config, session).answerMany(questions, { concurrency: config.concurrency })
  );

  for (const result of results) {
    if (result.ok) {
      console.log(JSON.stringify({ question: result.query, ...result.response }, null, 2));
    } else {
      console.error(`Consultation failed for "${result.query}": ${describeError(result.error)}`);
      process.exitCode = 1;
    }
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
