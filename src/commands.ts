import { ClientInput } from "./db/clients.js";
import { PostActionFailure } from "./pipeline/engine.js";
import { MarketingService, Target, TriggerOptions } from "./service.js";
import {
  createNotEligibleError,
  createNotFoundError,
  createValidationError,
  PipelineError
} from "./shared/errors.js";
import { ApprovalMode, Channel, ClientPageIds, ClientStatus, isChannel, RunMode } from "./shared/types.js";

export interface ParsedArgs {
  command: string;
  flags: Record<string, string | undefined>;
}

export const parseArgs = (args: string[]): ParsedArgs => {
  const [command, ...rest] = args;
  const flags: Record<string, string | undefined> = {};

  for (let index = 0; index < rest.length; index += 1) {
    const token = rest[index];
    if (!token?.startsWith("--")) {
      continue;
    }
    const value = rest[index + 1];
    if (!value || value.startsWith("--")) {
      flags[token] = undefined;
      continue;
    }
    flags[token] = value;
    index += 1;
  }

  return {
    command: command ?? "",
    flags
  };
};

export const requireFlag = (flags: Record<string, string | undefined>, flag: string): string => {
  const value = flags[flag];
  if (!value) {
    throw createValidationError(`Missing required ${flag}`);
  }
  return value;
};

export const parseChannel = (value: string): Channel => {
  if (!isChannel(value)) {
    throw createValidationError(`Invalid channel: ${value}`);
  }
  return value;
};

export const parseChannels = (value: string): Channel[] =>
  value.split(",").map(channel => parseChannel(channel.trim()));

export const parseCount = (flags: Record<string, string | undefined>, flag: string): number | undefined => {
  const raw = flags[flag];
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw createValidationError(`${flag} must be a non-negative integer, got "${raw}"`);
  }
  return value;
};

const parseMode = (value: string | undefined): RunMode => {
  if (value === undefined || value === "sync" || value === "async") return value ?? "sync";
  throw createValidationError(`Invalid mode: ${value}`);
};

const parseStatus = (value: string | undefined): ClientStatus | undefined => {
  if (value === undefined || value === "active" || value === "inactive") return value;
  throw createValidationError(`Invalid status: ${value}`);
};

const parseApprovalMode = (value: string | undefined): ApprovalMode | undefined => {
  if (value === undefined || value === "manual" || value === "auto") return value;
  throw createValidationError(`Invalid approval mode: ${value}`);
};

// --client <id> for one client, --all [--max-clients N] for every active client
export const parseTarget = (flags: Record<string, string | undefined>): Target => {
  if ("--all" in flags) {
    return { all: true, maxClients: parseCount(flags, "--max-clients") };
  }
  return { clientId: requireFlag(flags, "--client") };
};

const triggerOptions = (flags: Record<string, string | undefined>): TriggerOptions => ({
  mode: parseMode(flags["--mode"]),
  timeoutMs: parseCount(flags, "--timeout-ms")
});

export const parseClientInput = (flags: Record<string, string | undefined>): ClientInput => {
  const pageIds: ClientPageIds = {};
  if (flags["--facebook-page"]) pageIds.facebook = flags["--facebook-page"];
  if (flags["--instagram-account"]) pageIds.instagram = flags["--instagram-account"];
  if (flags["--linkedin-author"]) pageIds.linkedin = flags["--linkedin-author"];

  const channels = flags["--channels"];
  return {
    id: flags["--id"],
    name: requireFlag(flags, "--name"),
    handle: requireFlag(flags, "--handle"),
    status: parseStatus(flags["--status"]),
    channels: channels ? parseChannels(channels) : undefined,
    cadencePerWeek: parseCount(flags, "--cadence"),
    brandVoice: flags["--voice"],
    instructions: flags["--instructions"],
    approvalMode: parseApprovalMode(flags["--approval"]),
    pageIds: Object.keys(pageIds).length > 0 ? pageIds : undefined
  };
};

// Post actions report failures as values; the CLI turns them into errors
const postActionError = (postId: string, failure: { reason: PostActionFailure; message: string }): PipelineError =>
  failure.reason === "not_found"
    ? createNotFoundError("post", postId)
    : createNotEligibleError("post", postId, failure.message);

// Runs one service command and returns what the CLI prints as JSON
export const executeCommand = async (service: MarketingService, parsed: ParsedArgs): Promise<unknown> => {
  const { flags } = parsed;

  switch (parsed.command) {
    case "client-add":
      return service.upsertClient(parseClientInput(flags));
    case "clients":
      return service.listClients();
    case "curate":
      return service.curate(parseTarget(flags), parseCount(flags, "--ideas"), triggerOptions(flags));
    case "draft":
      return service.draft(parseTarget(flags), parseCount(flags, "--posts"), triggerOptions(flags));
    case "publish":
      return service.publish(requireFlag(flags, "--client"), triggerOptions(flags));
    case "workflow":
      return service.fullWorkflow(
        parseTarget(flags),
        parseCount(flags, "--ideas"),
        parseCount(flags, "--posts"),
        triggerOptions(flags)
      );
    case "submit": {
      const channel = flags["--channel"];
      return service.submitIdea(requireFlag(flags, "--client"), {
        text: requireFlag(flags, "--text"),
        imageUrl: flags["--image"],
        channel: channel ? parseChannel(channel) : undefined
      });
    }
    case "chat":
      return service.handleChatMessage(requireFlag(flags, "--handle"), requireFlag(flags, "--text"), {
        imageUrl: flags["--image"]
      });
    case "approve": {
      const postId = requireFlag(flags, "--id");
      const result = await service.approvePost(requireFlag(flags, "--client"), postId);
      if (!result.ok) throw postActionError(postId, result);
      return result;
    }
    case "reject": {
      const postId = requireFlag(flags, "--id");
      const result = await service.rejectPost(requireFlag(flags, "--client"), postId, flags["--feedback"]);
      if (!result.ok) throw postActionError(postId, result);
      return result;
    }
    case "pending":
      return service.listPendingPosts(requireFlag(flags, "--client"), parseCount(flags, "--limit"));
    case "health":
      return service.health();
    default:
      throw createValidationError(`Unknown command: ${parsed.command}`);
  }
};
