const gatewayBaseUrl = process.env.ADVISORY_GATEWAY_URL ?? "http://127.0.0.1:8000";
const authToken = process.env.ADVISORY_GATEWAY_AUTH_TOKEN;

async function main(): Promise<void> {
  const district = process.argv[2] ?? "patna";
  const state = process.argv[3] ?? "bihar";

  const headers: Record<string, string> = {
    "content-type": "application/json"
  };
  if (authToken && authToken.trim() !== "") {
    headers.authorization = `Bearer ${authToken}`;
  }

  const response = await fetch(`${gatewayBaseUrl}/v1/workflow`, {
    method: "POST",
    headers,
    body: JSON.stringify({ state, district })
  });

  const text = await response.text();
  if (!response.ok) {
    throw new Error(`Gateway request failed (${response.status}): ${text}`);
  }

  const result: unknown = JSON.parse(text);
  console.log(`Alert generated for ${district}, ${state}.`);
  console.log(JSON.stringify(result, null, 2));
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
