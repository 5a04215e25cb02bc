import dotenv from "dotenv";
dotenv.config();
import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { InMemoryPublishedPostRepository, loadPublishedPosts } from "./repositories/publishedPost.repository";

async function main() {
  const config = loadConfig();
  const postFinder = config.publishedPostsFile
    ? await loadPublishedPosts(config.publishedPostsFile)
    : new InMemoryPublishedPostRepository();
  console.info(`Loaded ${postFinder.size} published post(s) for internal linking`);

  const app = createApp(config, { postFinder });
  app.listen(config.port, () => {
    console.log(`CMS Backend running on http://localhost:${config.port}`);
  });
}

main().catch((err) => {
  console.error("Failed to start server", err);
  process.exit(1);
});
