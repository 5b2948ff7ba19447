import { cleanEnv, str, url } from "envalid";

const env = cleanEnv(process.env, {
  GITHUB_API_URL: url({ default: "https://api.github.com" }),
  GITHUB_USER_AGENT: str({ default: "supply-chain-score" }),
});

export default env;
