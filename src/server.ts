import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { CONFIG } from "./config.js";
import {
  createDateRange,
  createSingleDayRange,
  createWeekDateRange,
} from "./date-utils.js";
import { parseSchoolUrl, parseSetupCode } from "./endpoint-resolver.js";
import {
  AllCandidatesExhaustedError,
  AuthFailureError,
  MissingSchoolError,
  NoValidEndpointsError,
  NotAuthenticatedError,
  RefreshUnavailableError,
} from "./errors.js";
import { logger } from "./logger.js";
import {
  UntisSession,
  searchSchools,
  type SchoolSearchDeps,
} from "./untis-session.js";
import {
  CacheMode,
  ElementType,
  parseCacheMode,
  type DateRange,
  type Tenant,
} from "./types.js";

export interface ToolResult {
  [key: string]: unknown;
  content: { type: "text"; text: string }[];
  isError?: boolean;
}

export interface UntisBridgeServerOptions {
  /** Builds the session for a tenant; tests inject one backed by a fake transport. */
  createSession?: (tenant: Tenant) => UntisSession;
  searchDeps?: SchoolSearchDeps;
}

const rangeArgs = {
  date: z.string().optional(),
  from: z.string().optional(),
  to: z.string().optional(),
};

const loginArgs = z.object({
  server: z.string().optional(),
  school: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  school_url: z.string().optional(),
  setup_code: z.string().optional(),
});

const timetableArgs = z.object({
  ...rangeArgs,
  cache_mode: z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) {
        return undefined;
      }
      const mode = parseCacheMode(value);
      if (!mode) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown cache mode: ${value}` });
        return z.NEVER;
      }
      return mode;
    }),
  element_type: z.nativeEnum(ElementType).optional(),
  element_id: z.number().int().optional(),
});

const rangeOnlyArgs = z.object(rangeArgs);
const dateArgs = z.object({ date: z.string().optional() });
const masterDataArgs = z.object({
  kind: z.enum(["rooms", "klassen", "teachers", "subjects"]),
});
const schoolYearArgs = z.object({ all: z.boolean().optional() });
const searchArgs = z.object({ query: z.string().min(1) });

const RANGE_PROPERTIES = {
  date: {
    type: "string",
    description: "Single day in YYYY-MM-DD format (optional)",
  },
  from: {
    type: "string",
    description: "First day in YYYY-MM-DD format (optional, defaults to today)",
  },
  to: {
    type: "string",
    description: "Last day in YYYY-MM-DD format (optional, defaults to a week after from)",
  },
};

const TOOLS: Tool[] = [
  {
    name: "login",
    description:
      "Log in to a WebUntis school. Falls back to UNTIS_* environment settings for missing fields",
    inputSchema: {
      type: "object",
      properties: {
        server: { type: "string", description: "Server host, e.g. demo.webuntis.com" },
        school: { type: "string", description: "School login name" },
        username: { type: "string", description: "Username" },
        password: { type: "string", description: "Password" },
        school_url: {
          type: "string",
          description: "A WebUntis page URL carrying ?school=... (instead of server/school)",
        },
        setup_code: {
          type: "string",
          description: "An untis://setschool?... setup link (instead of server/school)",
        },
      },
    },
  },
  {
    name: "logout",
    description: "End the current session",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "session_status",
    description: "Show the current tenant, user and the endpoints pinned so far",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "refresh_session",
    description: "Renew the access token of a REST session without logging in again",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "get_timetable",
    description: "Get the timetable for a day or a date range",
    inputSchema: {
      type: "object",
      properties: {
        ...RANGE_PROPERTIES,
        cache_mode: {
          type: "string",
          description: "Cache mode (optional)",
          enum: Object.values(CacheMode),
        },
        element_type: {
          type: "string",
          description: "Whose timetable (optional, defaults to the logged-in person)",
          enum: Object.values(ElementType),
        },
        element_id: { type: "number", description: "Id of that element (optional)" },
      },
    },
  },
  {
    name: "get_user_data",
    description: "Get the logged-in user's profile and the school's master data",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "get_messages_of_day",
    description: "Get the messages of the day",
    inputSchema: {
      type: "object",
      properties: { date: RANGE_PROPERTIES.date },
    },
  },
  {
    name: "get_exams",
    description: "Get exams in a date range",
    inputSchema: { type: "object", properties: RANGE_PROPERTIES },
  },
  {
    name: "get_homework",
    description: "Get homework in a date range",
    inputSchema: { type: "object", properties: RANGE_PROPERTIES },
  },
  {
    name: "get_absences",
    description: "Get the student's absences in a date range",
    inputSchema: { type: "object", properties: RANGE_PROPERTIES },
  },
  {
    name: "get_master_data",
    description: "List the school's rooms, classes, teachers or subjects",
    inputSchema: {
      type: "object",
      properties: {
        kind: {
          type: "string",
          enum: ["rooms", "klassen", "teachers", "subjects"],
        },
      },
      required: ["kind"],
    },
  },
  {
    name: "get_school_year",
    description: "Get the current school year, or all of them",
    inputSchema: {
      type: "object",
      properties: {
        all: {
          type: "boolean",
          description: "List every school year (optional, default: false)",
          default: false,
        },
      },
    },
  },
  {
    name: "get_holidays",
    description: "Get the school's holidays",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "search_schools",
    description: "Find schools by name or town; needs no login",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "Part of the school name or address" },
      },
      required: ["query"],
    },
  },
];

function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown): T {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
      .join("; ");
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments: ${issues}`);
  }
  return parsed.data;
}

export function resolveRangeArgs(args: {
  date?: string;
  from?: string;
  to?: string;
}): DateRange {
  if (args.from && args.to) {
    return createDateRange(args.from, args.to);
  }
  if (args.date) {
    return createSingleDayRange(args.date);
  }
  return createWeekDateRange(args.from);
}

/** JSON for tool output; sets become arrays. */
export function toJson(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, item: unknown) => (item instanceof Set ? [...item] : item),
    2,
  );
}

function text(value: string, isError = false): ToolResult {
  return { content: [{ type: "text", text: value }], ...(isError ? { isError } : {}) };
}

export function errorGuidance(error: unknown): string {
  const message = error instanceof Error ? error.message : "Unknown error";

  if (error instanceof NotAuthenticatedError) {
    return `Error: ${message}\n\nUse the login tool with server, school, username and password.`;
  }
  if (error instanceof RefreshUnavailableError) {
    return `Error: ${message}\n\nOnly REST logins come with a refresh token.`;
  }
  if (error instanceof AuthFailureError) {
    return `Error: ${message}\n\nThe server rejected the session. Check username and password, then run login again.`;
  }
  if (error instanceof MissingSchoolError || error instanceof NoValidEndpointsError) {
    return `Error: ${message}\n\nPass server and school to login, or set UNTIS_SERVER and UNTIS_SCHOOL. search_schools finds both.`;
  }
  if (error instanceof AllCandidatesExhaustedError) {
    return `Error: ${message}\n\nThis server offers none of the known endpoints for this data, or it could not be reached.`;
  }
  return `Error: ${message}`;
}

export class UntisBridgeServer {
  private server: Server;
  private session: UntisSession | null = null;
  private readonly createSession: (tenant: Tenant) => UntisSession;
  private readonly searchDeps: SchoolSearchDeps;

  constructor(options: UntisBridgeServerOptions = {}) {
    this.server = new Server(
      {
        name: CONFIG.mcp.serverName,
        version: CONFIG.mcp.serverVersion,
      },
      {
        capabilities: {
          tools: {},
        },
      },
    );

    this.createSession =
      options.createSession ?? ((tenant) => UntisSession.create({ tenant }));
    this.searchDeps = options.searchDeps ?? {};
    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return { tools: TOOLS };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args);
    });
  }

  listTools(): Tool[] {
    return TOOLS;
  }

  async callTool(name: string, args: unknown): Promise<ToolResult> {
    try {
      switch (name) {
        case "login":
          return await this.login(parseArgs(loginArgs, args));

        case "logout": {
          if (!this.session) {
            return text("No active session.");
          }
          await this.session.logout();
          this.session = null;
          return text("Logged out.");
        }

        case "session_status":
          return text(
            toJson(
              this.session
                ? this.session.status()
                : {
                    authenticated: false,
                    configured: {
                      server: CONFIG.untis.server || null,
                      school: CONFIG.untis.school || null,
                      username: CONFIG.untis.username || null,
                    },
                  },
            ),
          );

        case "refresh_session":
          return await this.withSession(name, async (session) => {
            await session.refresh();
            return session.status();
          });

        case "search_schools": {
          const { query } = parseArgs(searchArgs, args);
          return await this.guarded(async () =>
            toJson(await searchSchools(query, this.searchDeps)),
          );
        }

        case "get_timetable": {
          const parsed = parseArgs(timetableArgs, args);
          return await this.withSession(name, async (session) => {
            const element =
              parsed.element_type && parsed.element_id !== undefined
                ? { type: parsed.element_type, id: parsed.element_id }
                : undefined;
            return session.getTimetable(resolveRangeArgs(parsed), {
              cacheMode: parsed.cache_mode,
              element,
            });
          });
        }

        case "get_user_data":
          return await this.withSession(name, (session) => session.getUserData());

        case "get_messages_of_day": {
          const { date } = parseArgs(dateArgs, args);
          return await this.withSession(name, (session) =>
            session.getMessagesOfDay(
              date ? createSingleDayRange(date).from : new Date(),
            ),
          );
        }

        case "get_exams": {
          const range = resolveRangeArgs(parseArgs(rangeOnlyArgs, args));
          return await this.withSession(name, (session) => session.getExams(range));
        }

        case "get_homework": {
          const range = resolveRangeArgs(parseArgs(rangeOnlyArgs, args));
          return await this.withSession(name, (session) => session.getHomework(range));
        }

        case "get_absences": {
          const range = resolveRangeArgs(parseArgs(rangeOnlyArgs, args));
          return await this.withSession(name, (session) => session.getAbsences(range));
        }

        case "get_master_data": {
          const { kind } = parseArgs(masterDataArgs, args);
          return await this.withSession(name, (session) => session.getElements(kind));
        }

        case "get_school_year": {
          const { all } = parseArgs(schoolYearArgs, args);
          return await this.withSession(name, (session) =>
            all ? session.getSchoolYears() : session.getCurrentSchoolYear(),
          );
        }

        case "get_holidays":
          return await this.withSession(name, (session) => session.getHolidays());

        default:
          throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }
    } catch (error) {
      if (error instanceof McpError) {
        throw error;
      }
      throw new McpError(
        ErrorCode.InternalError,
        `Tool execution failed: ${error instanceof Error ? error.message : "Unknown error"}`,
      );
    }
  }

  private async login(args: z.infer<typeof loginArgs>): Promise<ToolResult> {
    let tenant: Tenant = {
      host: args.server ?? CONFIG.untis.server,
      school: args.school ?? CONFIG.untis.school,
    };
    let username = args.username ?? CONFIG.untis.username;

    if (args.setup_code) {
      const link = parseSetupCode(args.setup_code);
      if (!link) {
        return text("Error: setup_code is not an untis://setschool link", true);
      }
      tenant = link.tenant;
      username = args.username ?? link.user ?? username;
    } else if (args.school_url) {
      const parsed = parseSchoolUrl(args.school_url);
      if (!parsed) {
        return text("Error: school_url carries no ?school= parameter", true);
      }
      tenant = parsed;
    }

    const password = args.password ?? CONFIG.untis.password;
    if (username === "" || password === "") {
      return text(
        "Error: username and password are required\n\nPass them to login, or set UNTIS_USERNAME and UNTIS_PASSWORD.",
        true,
      );
    }

    return this.guarded(async () => {
      if (this.session) {
        await this.session.logout();
      }
      this.session = null;

      const session = this.createSession(tenant);
      await session.login(username, password);
      this.session = session;
      return `[SUCCESS] Logged in as ${username}\n\n${toJson(session.status())}`;
    });
  }

  private async withSession(
    tool: string,
    work: (session: UntisSession) => Promise<unknown>,
  ): Promise<ToolResult> {
    const session = this.session;
    if (!session) {
      return text(errorGuidance(new NotAuthenticatedError(tool)), true);
    }
    return this.guarded(async () => toJson(await work(session)));
  }

  private async guarded(work: () => Promise<string>): Promise<ToolResult> {
    try {
      return text(await work());
    } catch (error) {
      logger.error("[ERROR] Tool call failed:", error instanceof Error ? error.message : error);
      return text(errorGuidance(error), true);
    }
  }

  async start(): Promise<void> {
    try {
      const transport = new StdioServerTransport();
      await this.server.connect(transport);
      logger.info("[INFO] untis-bridge MCP server started successfully");
    } catch (error) {
      logger.error("[ERROR] Failed to start server:", error);
      process.exit(1);
    }
  }
}
