import { run } from "./run"

const app = await run()

await app.producer.enqueue("thumbnail", { path: "/tmp/a.png" })
await app.producer.enqueue("thumbnail", { path: "/tmp/b.png" })

process.once("SIGINT", () => {
  app.logger.info("shutting down")
  app.stop().catch((err: unknown) => {
    app.logger.fatal("shutdown failed", { err })
    process.exitCode = 1
  })
})
