import { createServer, type IncomingMessage, type ServerResponse } from "node:http";

import { buildMockObservations, paginateObservations } from "./mockData";

const port = Number.parseInt(process.env.PORT ?? "3100", 10);
const apiKey = process.env.MOCK_API_KEY ?? "mock-api-key";
const hoursOfData = Number.parseInt(process.env.MOCK_HOURS ?? "2000", 10);
const transientFailureRate = Number.parseFloat(process.env.MOCK_TRANSIENT_FAILURE_RATE ?? "0");
const dataStartMs = Date.now() - hoursOfData * 60 * 60 * 1000;

const OBSERVATIONS_PATH = /^\/api\/v1\/locations\/([^/]+)\/observations$/;
const datasets = new Map<string, ReturnType<typeof buildMockObservations>>();

function writeJson(
  response: ServerResponse,
  statusCode: number,
  payload: unknown,
  headers: Record<string, string> = {}
): void {
  response.statusCode = statusCode;
  response.setHeader("Content-Type", "application/json");
  for (const [name, value] of Object.entries(headers)) {
    response.setHeader(name, value);
  }
  response.end(JSON.stringify(payload));
}

function isAuthorized(request: IncomingMessage): boolean {
  return request.headers["x-api-key"] === apiKey;
}

function observationsFor(locationId: string): ReturnType<typeof buildMockObservations> {
  let observations = datasets.get(locationId);
  if (!observations) {
    observations = buildMockObservations(locationId, dataStartMs, hoursOfData);
    datasets.set(locationId, observations);
  }
  return observations;
}

const server = createServer((request, response) => {
  if (!request.url) {
    writeJson(response, 400, { error: "Missing URL" });
    return;
  }

  const url = new URL(request.url, `http://localhost:${port}`);

  if (url.pathname === "/health") {
    writeJson(response, 200, { status: "ok" });
    return;
  }

  const match = OBSERVATIONS_PATH.exec(url.pathname);
  if (!match) {
    writeJson(response, 404, { error: "Not Found" });
    return;
  }

  if (!isAuthorized(request)) {
    writeJson(response, 401, { error: "Unauthorized" });
    return;
  }

  if (Math.random() < transientFailureRate) {
    writeJson(response, 503, { error: "Service Unavailable" }, { "Retry-After": "1" });
    return;
  }

  const start = url.searchParams.get("start");
  const end = url.searchParams.get("end");
  if (!start || !end) {
    writeJson(response, 400, { error: "start and end are required" });
    return;
  }

  try {
    const page = paginateObservations(observationsFor(decodeURIComponent(match[1])), {
      start,
      end,
      limit: Number.parseInt(url.searchParams.get("limit") ?? "500", 10),
      pageToken: url.searchParams.get("page_token")
    });
    writeJson(response, 200, page);
  } catch (error) {
    writeJson(response, 400, {
      error: "Invalid page token",
      message: error instanceof Error ? error.message : "Invalid page token"
    });
  }
});

server.listen(port, "0.0.0.0", () => {
  console.log(`mock weather api listening on port ${port} with ${hoursOfData} hourly observations per location`);
});
