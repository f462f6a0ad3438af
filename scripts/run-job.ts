import { closeDbPool } from "../src/db/client";
import { runGatewayRelayJob, runRefundEligibilityReportJob } from "../src/lib/jobs";

async function main() {
  const job = process.argv[2];
  switch (job) {
    case "gateway-relay":
      console.log(JSON.stringify(await runGatewayRelayJob(), null, 2));
      break;
    case "refund-eligibility":
      console.log(JSON.stringify(await runRefundEligibilityReportJob(), null, 2));
      break;
    default:
      console.error("Usage: npm run job -- <gateway-relay|refund-eligibility>");
      process.exit(1);
  }
}

main()
  .catch((error) => {
    console.error(error);
    process.exitCode = 1;
  })
  .finally(() => closeDbPool());
