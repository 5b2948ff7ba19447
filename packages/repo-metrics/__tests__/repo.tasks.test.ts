import { runCommand } from "../src/tasks/repo.tasks";
import { createFakeForge, jsonResponse, records } from "./fake-forge";

const COMMITS = [
  { sha: "c3", commit: { author: { date: "2022-06-01T12:00:00Z" } } },
  { sha: "c2", commit: { author: { date: "2021-02-01T12:00:00Z" } } },
  { sha: "c1", commit: { author: { date: "2020-01-01T12:00:00Z" } } },
];

describe("runCommand", () => {
  let log: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "info").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function serveRepo() {
    const forge = createFakeForge((request) =>
      request.url.pathname.endsWith("/commits")
        ? jsonResponse(COMMITS)
        : jsonResponse(records(4))
    );
    jest.spyOn(globalThis, "fetch").mockImplementation(forge.fetch);
    return forge;
  }

  it("prints the summary as JSON", async () => {
    const forge = serveRepo();

    await runCommand("summary", ["https://github.com/foo/bar"]);

    expect(forge.requests).toHaveLength(5);
    expect(log.mock.calls).toEqual([
      ["Executing repo task: summary"],
      [
        JSON.stringify(
          {
            owner: "foo",
            name: "bar",
            url: "https://github.com/foo/bar",
            contributors: 4,
            forks: 4,
            releases: 4,
            issues: 4,
            commits: 3,
            stars: null,
          },
          null,
          2
        ),
      ],
    ]);
  });

  it("prints how many commits predate the date", async () => {
    serveRepo();

    await runCommand("commits-before", [
      "https://github.com/foo/bar",
      "2021-06-01",
    ]);

    expect(log).toHaveBeenLastCalledWith(
      "2 commits in foo/bar before 2021-06-01"
    );
  });

  it("rejects unknown commands without announcing them", async () => {
    await expect(runCommand("fetch:all", [])).rejects.toThrow(
      "Unknown command: fetch:all"
    );
    expect(log).not.toHaveBeenCalled();
  });

  it("needs a repo URL for summary", async () => {
    await expect(runCommand("summary", [])).rejects.toThrow("Usage:");
  });

  it("needs a date for commits-before", async () => {
    await expect(
      runCommand("commits-before", ["https://github.com/foo/bar"])
    ).rejects.toThrow("Usage:");
  });

  it("rejects dates in another format", async () => {
    await expect(
      runCommand("commits-before", ["https://github.com/foo/bar", "01/02/2021"])
    ).rejects.toThrow('Invalid date "01/02/2021", expected yyyy-MM-dd');
    expect(log).not.toHaveBeenCalled();
  });
});
