import { isValid, parse } from "date-fns";
import { createContext } from "../context";
import { GithubRepo } from "../github/client";
import { countCommitsBefore, summarizeRepo } from "../summary";

const USAGE =
  "Usage: repo.tasks <summary <repo-url> | commits-before <repo-url> <yyyy-MM-dd>>";

async function runCommand(command: string, args: string[]): Promise<void> {
  switch (command) {
    case "summary": {
      const [url] = args;
      if (!url) throw new Error(USAGE);
      console.log(`Executing repo task: ${command}`);

      const repo = await GithubRepo.create(createContext(), url);
      console.log(JSON.stringify(summarizeRepo(repo), null, 2));
      break;
    }
    case "commits-before": {
      const [url, day] = args;
      if (!url || !day) throw new Error(USAGE);

      const date = parse(day, "yyyy-MM-dd", new Date());
      if (!isValid(date)) {
        throw new Error(`Invalid date "${day}", expected yyyy-MM-dd`);
      }
      console.log(`Executing repo task: ${command}`);

      const repo = await GithubRepo.create(createContext(), url);
      console.log(
        `${countCommitsBefore(repo, date)} commits in ${repo.owner}/${repo.name} before ${day}`
      );
      break;
    }
    default:
      throw new Error(`Unknown command: ${command}\n${USAGE}`);
  }
}

if (require.main === module) {
  const [command, ...args] = process.argv.slice(2);
  if (!command) {
    console.error(USAGE);
    process.exit(1);
  }

  runCommand(command, args)
    .then(() => {
      console.log("Command completed successfully!");
      process.exit(0);
    })
    .catch((error) => {
      console.error("Command failed:", error);
      process.exit(1);
    });
}

export { runCommand };
