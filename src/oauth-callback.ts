import { once } from "node:events";
import http from "node:http";

import { AuthError } from "./errors.js";

const CALLBACK_PATH = "/oauth2callback";
const CALLBACK_TIMEOUT_MS = 5 * 60 * 1000;

export interface RedirectListener {
  redirectUri: string;
  /** Query of the first request that reaches the callback path. */
  params: Promise<URLSearchParams>;
  close(): void;
}

/** Listen on a free loopback port for the browser's redirect back from Google. */
export async function listenForRedirect(timeoutMs = CALLBACK_TIMEOUT_MS): Promise<RedirectListener> {
  const server = http.createServer();
  server.listen(0, "127.0.0.1");
  await once(server, "listening");

  const address = server.address();
  if (!address || typeof address === "string") {
    server.close();
    throw new AuthError("Could not open a local port for the sign-in callback");
  }
  const redirectUri = `http://127.0.0.1:${String(address.port)}${CALLBACK_PATH}`;

  let timer: NodeJS.Timeout | undefined;
  const params = new Promise<URLSearchParams>((resolve, reject) => {
    timer = setTimeout(() => {
      reject(new AuthError(`No sign-in callback within ${String(Math.round(timeoutMs / 1000))}s`));
    }, timeoutMs);

    server.on("request", (req: http.IncomingMessage, res: http.ServerResponse) => {
      const url = new URL(req.url ?? "/", redirectUri);
      if (url.pathname !== CALLBACK_PATH) {
        res.writeHead(404).end();
        return;
      }
      const ok = url.searchParams.has("code") && !url.searchParams.has("error");
      res.writeHead(ok ? 200 : 400, { "Content-Type": "text/plain; charset=utf-8" });
      res.end(ok ? "Signed in. You can close this tab." : "Sign-in failed; see the terminal.");
      resolve(url.searchParams);
    });
  });

  return {
    redirectUri,
    params,
    close: () => {
      clearTimeout(timer);
      server.closeAllConnections();
      server.close();
    },
  };
}
