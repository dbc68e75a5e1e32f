import { CommandUnavailableError } from "./errors.js";
import { formatCommand, type CommandResult, type CommandRunner, type CommandSpec, type RunOptions } from "./exec.js";
import type { ModuleContext } from "./modules/types.js";
import type { DesiredUnit, FileUnit, PackageUnit, ReconcileSettings, ServiceUnit } from "./types.js";

export interface FakeService {
  /** systemctl is-enabled output: enabled, disabled, static, ... */
  enabled: string;
  active: boolean;
}

export const TEST_SETTINGS: ReconcileSettings = {
  packageManager: "dnf",
  commandTimeoutMs: 1000,
  concurrency: 1,
  rollback: true,
  backupRetention: 3,
};

export const FIXED_NOW = () => new Date("2026-03-01T12:00:00.000Z");

const ok = (stdout = ""): CommandResult => ({ exitCode: 0, stdout, stderr: "" });
const fail = (exitCode: number, stderr: string, stdout = ""): CommandResult => ({ exitCode, stdout, stderr });

/**
 * In-process stand-in for rpm, dnf, dpkg-query, apt-get and systemctl.
 * Every command is recorded; failOn/rejectOn script failures by the
 * formatted command line.
 */
export class FakeHost implements CommandRunner {
  /** Installed packages: name -> version-release. */
  readonly packages = new Map<string, string>();
  /** Installable packages: name -> version-release the repository offers. */
  readonly repository = new Map<string, string>();
  readonly services = new Map<string, FakeService>();
  readonly commands: string[] = [];
  private readonly failures = new Map<string, CommandResult>();
  private readonly rejections = new Map<string, Error>();

  failOn(command: string, result: Partial<CommandResult> = {}): this {
    this.failures.set(command, { exitCode: result.exitCode ?? 1, stdout: result.stdout ?? "", stderr: result.stderr ?? "" });
    return this;
  }

  rejectOn(command: string, error: Error = new CommandUnavailableError(command)): this {
    this.rejections.set(command, error);
    return this;
  }

  /** Commands that change the host, in the order they ran. */
  mutations(): string[] {
    return this.commands.filter(
      (line) => !line.startsWith("rpm -q") && !line.startsWith("dpkg-query") && !/^systemctl is-(enabled|active) /.test(line),
    );
  }

  async run(command: CommandSpec, options?: RunOptions): Promise<CommandResult> {
    const line = formatCommand(command);
    this.commands.push(line);

    const rejection = this.rejections.get(line);
    if (rejection) throw rejection;
    const failure = this.failures.get(line);
    if (failure) return failure;

    const result = this.execute(command);
    if (result.stdout) options?.onProgress?.({ type: "stdout", data: result.stdout });
    options?.onProgress?.({ type: "done", exitCode: result.exitCode });
    return result;
  }

  private execute({ cmd, args }: CommandSpec): CommandResult {
    switch (cmd) {
      case "rpm":
        return this.rpmQuery(args[args.length - 1] ?? "");
      case "dpkg-query":
        return this.dpkgQuery(args[args.length - 1] ?? "");
      case "dnf":
      case "yum":
        return this.packageChange(args[0] ?? "", args[args.length - 1] ?? "", "-");
      case "apt-get":
        return this.packageChange(args[0] ?? "", args[args.length - 1] ?? "", "=");
      case "systemctl":
        return this.systemctl(args[0] ?? "", args[1] ?? "");
      default:
        return fail(127, `${cmd}: command not found`);
    }
  }

  private rpmQuery(name: string): CommandResult {
    const version = this.packages.get(name);
    return version ? ok(`${version}\n`) : fail(1, "", `package ${name} is not installed\n`);
  }

  private dpkgQuery(name: string): CommandResult {
    const version = this.packages.get(name);
    return version ? ok(`install ok installed|${version}`) : fail(1, `dpkg-query: no packages found matching ${name}\n`);
  }

  private resolveSpec(spec: string, separator: string): { name: string; version: string } | null {
    const offered = this.repository.get(spec);
    if (offered) return { name: spec, version: offered };
    for (const name of this.repository.keys()) {
      if (spec.startsWith(`${name}${separator}`)) {
        return { name, version: spec.slice(name.length + 1) };
      }
    }
    return null;
  }

  private packageChange(verb: string, spec: string, separator: string): CommandResult {
    if (verb === "install") {
      const resolved = this.resolveSpec(spec, separator);
      if (!resolved) return fail(1, `Error: Unable to find a match: ${spec}\n`);
      this.packages.set(resolved.name, resolved.version);
      return ok(`Installed: ${resolved.name}-${resolved.version}\n`);
    }
    if (verb === "remove") {
      if (!this.packages.delete(spec)) return fail(1, `No match for argument: ${spec}\n`);
      return ok(`Removed: ${spec}\n`);
    }
    return fail(1, `unknown command: ${verb}\n`);
  }

  private systemctl(verb: string, name: string): CommandResult {
    const service = this.services.get(name);
    switch (verb) {
      case "is-enabled":
        if (!service) return fail(1, `Failed to get unit file state for ${name}.service: No such file or directory\n`);
        return { exitCode: service.enabled === "enabled" ? 0 : 1, stdout: `${service.enabled}\n`, stderr: "" };
      case "is-active":
        if (!service) return fail(3, "", "inactive\n");
        return service.active ? ok("active\n") : fail(3, "", "inactive\n");
      case "enable":
      case "disable":
        if (!service) return fail(1, `Failed to ${verb} unit: Unit file ${name}.service does not exist.\n`);
        if (service.enabled === "enabled" || service.enabled === "disabled") {
          service.enabled = verb === "enable" ? "enabled" : "disabled";
        }
        return ok();
      case "start":
      case "restart":
        if (!service) return fail(5, `Failed to ${verb} ${name}.service: Unit ${name}.service not found.\n`);
        service.active = true;
        return ok();
      case "stop":
        if (!service) return fail(5, `Failed to stop ${name}.service: Unit ${name}.service not loaded.\n`);
        service.active = false;
        return ok();
      default:
        return fail(1, `Unknown command verb ${verb}.\n`);
    }
  }
}

export function createTestContext(
  host: CommandRunner,
  units: Iterable<DesiredUnit> = [],
  settings: Partial<ReconcileSettings> = {},
): ModuleContext {
  return {
    runner: host,
    settings: { ...TEST_SETTINGS, ...settings },
    units: new Map([...units].map((unit): [string, DesiredUnit] => [unit.name, unit])),
    now: FIXED_NOW,
  };
}

export function packageUnit(name: string, overrides: Partial<PackageUnit> = {}): PackageUnit {
  return { name, kind: "package", dependencies: [], packageName: name, state: "present", ...overrides };
}

export function serviceUnit(name: string, overrides: Partial<ServiceUnit> = {}): ServiceUnit {
  return {
    name,
    kind: "service",
    dependencies: [],
    serviceName: name,
    state: "running",
    enabled: true,
    restartOn: [],
    ...overrides,
  };
}

export function fileUnit(name: string, path: string, overrides: Partial<FileUnit> = {}): FileUnit {
  return { name, kind: "file", dependencies: [], path, state: "present", content: "", pause: [], ...overrides };
}
