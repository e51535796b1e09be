import which from 'which'

export interface CommandParts {
  program: string
  args: string[]
  env: Record<string, string>
  cwd?: string
}

export interface ResolvedCommand extends CommandParts {
  resolvedPath: string
}

/** `{name}` placeholders in worker args. Unknown names are left as-is. */
export function substitute(template: string, values: Record<string, string>): string {
  return template.replace(/\{([a-z]+)\}/g, (whole, name: string) => values[name] ?? whole)
}

export class CommandBuilder {
  private baseCommand: string
  private args: string[] = []
  private envVars: Record<string, string> = {}
  private workDir?: string

  private constructor(baseCommand: string) {
    this.baseCommand = baseCommand
  }

  static create(baseCommand: string): CommandBuilder {
    return new CommandBuilder(baseCommand)
  }

  params(args: string[]): this {
    this.args.push(...args)
    return this
  }

  /** Append args after substituting placeholders. */
  template(args: string[], values: Record<string, string>): this {
    this.args.push(...args.map((arg) => substitute(arg, values)))
    return this
  }

  env(key: string, value: string): this {
    this.envVars[key] = value
    return this
  }

  envs(vars: Record<string, string>): this {
    Object.assign(this.envVars, vars)
    return this
  }

  cwd(dir: string | undefined): this {
    this.workDir = dir
    return this
  }

  build(): CommandParts {
    // Parse base command into program + initial args
    const [program = '', ...baseArgs] = this.baseCommand.trim().split(/\s+/)
    if (!program) {
      throw new Error('Empty worker command')
    }
    return {
      program,
      args: [...baseArgs, ...this.args],
      env: { ...this.envVars },
      cwd: this.workDir,
    }
  }

  /** Resolve the program on PATH. Throws when it cannot be found. */
  async resolve(): Promise<ResolvedCommand> {
    const parts = this.build()
    const resolvedPath = await which(parts.program, {
      nothrow: true,
      path: parts.env.PATH,
    })
    if (!resolvedPath) {
      throw new Error(`Worker command not found: ${parts.program}`)
    }
    return { ...parts, resolvedPath }
  }
}
