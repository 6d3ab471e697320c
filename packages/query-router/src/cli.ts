import "dotenv/config";
import { startCli } from "./console";

startCli().then((code) => {
  process.exitCode = code;
});
