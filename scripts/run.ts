import { config as loadEnv } from "dotenv";
import { main } from "../src/app.js";

loadEnv();

main(process.env)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
