import { buildServer } from "./server.js";

const app = await buildServer();
const port = Number(process.env.PORT || 0) || 4103;

app.listen({ port, host: "0.0.0.0" })
  .then(() => app.log.info("ledger-adapter listening on :" + port))
  .catch((err) => {
    app.log.error(err);
    process.exit(1);
  });
