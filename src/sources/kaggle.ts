import * as core from "@actions/core";
import { z } from "zod";
import { FetchError, describeError } from "../errors.js";
import type { WatchConfig } from "../config.js";
import type { KernelInfo } from "./types.js";

const KERNEL_PAGE_URL = "https://www.kaggle.com/code";

const KernelListSchema = z.array(
  z.object({
    ref: z.string().min(1),
    title: z.string(),
    author: z.string().nullish(),
  })
);

export interface KaggleCredentials {
  username: string;
  key: string;
}

function buildListUrl(competition: string, config: WatchConfig): string {
  const listing = config.listing;
  const url = new URL(`${listing.api_url.replace(/\/+$/, "")}/kernels/list`);
  url.searchParams.set("competition", competition);
  url.searchParams.set("sortBy", listing.sort_by);
  url.searchParams.set("language", listing.language);
  url.searchParams.set("kernelType", listing.kernel_type);
  url.searchParams.set("outputType", listing.output_type);
  url.searchParams.set("page", "1");
  url.searchParams.set("pageSize", String(listing.page_size));
  return url.toString();
}

function readCredentials(): KaggleCredentials | undefined {
  const username = core.getInput("kaggle_username");
  const key = core.getInput("kaggle_key");
  if (!username || !key) return undefined;
  return { username, key };
}

function authHeader(credentials: KaggleCredentials): string {
  const token = Buffer.from(`${credentials.username}:${credentials.key}`).toString(
    "base64"
  );
  return `Basic ${token}`;
}

export async function fetchPublicKernels(
  competition: string,
  config: WatchConfig,
  fetchFn?: typeof fetch,
  credentials?: KaggleCredentials
): Promise<KernelInfo[]> {
  const fetcher = fetchFn ?? fetch;
  const auth = credentials ?? readCredentials();
  const url = buildListUrl(competition, config);

  core.info(`Fetching public kernels for ${competition}`);

  let body: unknown;
  try {
    const response = await fetcher(url, {
      headers: {
        Accept: "application/json",
        ...(auth ? { Authorization: authHeader(auth) } : {}),
      },
      signal: AbortSignal.timeout(config.request_timeout_seconds * 1000),
    });
    if (!response.ok) {
      throw new FetchError(
        `Kernel listing returned HTTP ${response.status}`,
        competition,
        response.status
      );
    }
    body = await response.json();
  } catch (error) {
    if (error instanceof FetchError) throw error;
    throw new FetchError(
      `Kernel listing request failed: ${describeError(error)}`,
      competition,
      undefined,
      { cause: error }
    );
  }

  const parsed = KernelListSchema.safeParse(body);
  if (!parsed.success) {
    throw new FetchError(
      `Unexpected kernel listing payload: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      competition
    );
  }

  return parsed.data.map((kernel) => ({
    title: kernel.title,
    identifier: kernel.ref,
    author: kernel.author ?? undefined,
    url: `${KERNEL_PAGE_URL}/${kernel.ref}`,
  }));
}

export { buildListUrl, authHeader };
