import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import autocannon from "autocannon";

interface Scenario {
  name: string;
  targetRps: number;
  /** Distinct client IPs the requests rotate through. */
  clients: number;
  organizationId?: string;
}

interface ScenarioResult {
  name: string;
  targetRps: number;
  achievedRps: number;
  p50: number;
  p95: number;
  p99: number;
  rejectedRate: number;
}

const scenarios: Scenario[] = [
  { name: "single-client", targetRps: 1000, clients: 1 },
  { name: "spread-clients", targetRps: 5000, clients: 500 },
  { name: "spread-with-quota", targetRps: 5000, clients: 500, organizationId: "load-org" }
];

function checkBody(scenario: Scenario, sequence: number): string {
  const client = sequence % scenario.clients;
  return JSON.stringify({
    ip: `10.0.${Math.floor(client / 256)}.${client % 256}`,
    identity: { id: `load-user-${client}`, role: "user" },
    organization: scenario.organizationId
      ? { id: scenario.organizationId, resourceType: "calculations" }
      : undefined,
    endpoint: "/v1/calculations"
  });
}

function runScenario(url: string, scenario: Scenario, durationSeconds = 15): Promise<ScenarioResult> {
  let sequence = 0;

  return new Promise((resolve, reject) => {
    const instance = autocannon({
      url,
      connections: 200,
      duration: durationSeconds,
      overallRate: scenario.targetRps,
      pipelining: 1,
      requests: [
        {
          method: "POST",
          headers: { "content-type": "application/json" },
          setupRequest: (request) => {
            sequence += 1;
            return { ...request, body: checkBody(scenario, sequence) };
          }
        }
      ]
    });

    instance.on("done", (result) => {
      const totalResponses =
        (result["1xx"] ?? 0) +
        (result["2xx"] ?? 0) +
        (result["3xx"] ?? 0) +
        (result["4xx"] ?? 0) +
        (result["5xx"] ?? 0);

      const rejected = (result["4xx"] ?? 0) + (result["5xx"] ?? 0);
      const rejectedRate = totalResponses > 0 ? (rejected / totalResponses) * 100 : 0;

      resolve({
        name: scenario.name,
        targetRps: scenario.targetRps,
        achievedRps: Number(result.requests.average.toFixed(2)),
        p50: Number(result.latency.p50.toFixed(2)),
        p95: Number(result.latency.p95.toFixed(2)),
        p99: Number(result.latency.p99.toFixed(2)),
        rejectedRate: Number(rejectedRate.toFixed(2))
      });
    });

    instance.on("error", (error) => {
      reject(error);
    });
  });
}

async function main(): Promise<void> {
  const endpoint = process.env.LOAD_URL ?? "http://localhost:3001/v1/admission/check";
  const results: ScenarioResult[] = [];

  for (const scenario of scenarios) {
    const result = await runScenario(endpoint, scenario);
    results.push(result);
    console.log(
      `[load] ${result.name} | target=${result.targetRps} rps | achieved=${result.achievedRps} rps | p95=${result.p95}ms | rejected=${result.rejectedRate}%`
    );
  }

  await mkdir("reports", { recursive: true });

  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
  const reportPath = join("reports", `admission-load-${timestamp}.json`);

  await writeFile(
    reportPath,
    JSON.stringify({ createdAt: new Date().toISOString(), endpoint, scenarios: results }, null, 2),
    "utf8"
  );

  console.log(`\nReport written to ${reportPath}`);
  console.log("\nscenario\ttargetRps\tachievedRps\tp50\tp95\tp99\trejectedRate");
  for (const item of results) {
    console.log(
      `${item.name}\t${item.targetRps}\t${item.achievedRps}\t${item.p50}\t${item.p95}\t${item.p99}\t${item.rejectedRate}%`
    );
  }
}

main().catch((error) => {
  console.error("Load test failed", error);
  process.exit(1);
});
