import { createServer, type Server, type ServerResponse } from "node:http";

import { describeError } from "../errors";
import type { RouteRequest, RouteResponse } from "./routes";

export type RequestRouter = (request: RouteRequest) => Promise<RouteResponse>;

function writeJson(response: ServerResponse, statusCode: number, payload: unknown): void {
  response.statusCode = statusCode;
  response.setHeader("Content-Type", "application/json");
  response.end(JSON.stringify(payload));
}

export function createHttpServer(router: RequestRouter): Server {
  return createServer((request, response) => {
    if (!request.url || !request.method) {
      writeJson(response, 400, { error: "Missing URL" });
      return;
    }

    const routeRequest: RouteRequest = {
      method: request.method,
      url: request.url,
      authorization: request.headers.authorization ?? null
    };

    router(routeRequest).then(
      (result) => {
        writeJson(response, result.status, result.body);
      },
      (error: unknown) => {
        console.error(
          `request failed (method=${routeRequest.method}, url=${routeRequest.url}, error=${describeError(error)})`
        );
        writeJson(response, 500, { error: "Internal Server Error" });
      }
    );
  });
}

export async function listen(server: Server, port: number): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, "0.0.0.0", () => {
      server.off("error", reject);
      resolve();
    });
  });
}

export async function closeServer(server: Server): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
  });
}
