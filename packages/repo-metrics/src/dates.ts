import { isBefore, isValid, parse } from "date-fns";
import { CommitDateFormatError, CommitFieldMissingError } from "./errors";
import { RepoRecord, isRepoRecord } from "./records";

// The trailing Z is matched literally: the date is read as wall-clock
// time, the same way the reference date handed to us is.
export const COMMIT_DATE_FORMAT = "yyyy-MM-dd'T'HH:mm:ss'Z'";

// date-fns reads each token as "up to N digits"; every field is fixed width.
const COMMIT_DATE_SHAPE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

export function getCommitDate(commit: RepoRecord): string {
  const details = commit.commit;
  const author = isRepoRecord(details) ? details.author : undefined;
  const date = isRepoRecord(author) ? author.date : undefined;
  if (typeof date !== "string") {
    throw new CommitFieldMissingError("commit.author.date");
  }
  return date;
}

export function parseCommitDate(value: string): Date {
  if (!COMMIT_DATE_SHAPE.test(value)) {
    throw new CommitDateFormatError(value, COMMIT_DATE_FORMAT);
  }
  const parsed = parse(value, COMMIT_DATE_FORMAT, new Date());
  if (!isValid(parsed)) {
    throw new CommitDateFormatError(value, COMMIT_DATE_FORMAT);
  }
  return parsed;
}

export function isCommitBeforeDate(commit: RepoRecord, date: Date): boolean {
  return isBefore(parseCommitDate(getCommitDate(commit)), date);
}
