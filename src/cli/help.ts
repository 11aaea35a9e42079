/**
 * @fileoverview Help text for spm-bootstrap commands
 */

const BUILD_FLAGS = `
    --build-dir PATH         Where products are built (default: .build)
    -v, --verbose            Echo every command before running it
    --swiftc PATH            Swift compiler for the bootstrap build
                             (default: $SWIFT_EXEC, then xcrun/which)
    --release                Build the self-hosted stage in release mode
    --project-root PATH      Package manager checkout (default: current directory)
    --llbuild-source-dir PATH
                             llbuild checkout (default: <project-root>/../llbuild)
    --llbuild-build-dir PATH Use an existing llbuild build and skip building it
    --llbuild-link-framework Link llbuild as a framework bundle
    --prefix PATH            Install prefix; repeatable, the first is used (default: /usr/local)
    --install-libspm         Also install the package manager library
    --reconfigure            Re-run CMake even if a build directory is configured`;

const HELP_TEXT = {
  main: `
spm-bootstrap - Build the Swift package manager with CMake, then with itself

USAGE:
    spm-bootstrap [command] [options]

COMMANDS:
    build               Build llbuild, the package manager with CMake, then with itself (default)
    test                Build, then run the self-built test runner
    install             Build, then install the CMake-built products
    clean               Remove the build directory
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    --version           Show version information

Run 'spm-bootstrap help <command>' for command options.
`,

  build: `
spm-bootstrap build - Bootstrap the package manager

USAGE:
    spm-bootstrap build [options]

STAGES:
    1. llbuild with CMake + Ninja (skipped with --llbuild-build-dir)
    2. the package manager with CMake + Ninja
    3. the package manager with the swift-build produced by stage 2

    CMake is only run for a build directory that has no CMakeCache.txt.

OPTIONS:${BUILD_FLAGS}
`,

  test: `
spm-bootstrap test - Build, then test with the self-built swift-test

USAGE:
    spm-bootstrap test [options]

OPTIONS:${BUILD_FLAGS}
    --parallel               Run tests in parallel (default)
    --no-parallel            Run tests serially
    --filter NAME            Only run matching tests; repeatable
`,

  install: `
spm-bootstrap install - Build, then run 'ninja install' in the CMake build

USAGE:
    spm-bootstrap install [options]

OPTIONS:${BUILD_FLAGS}
`,

  clean: `
spm-bootstrap clean - Remove the build directory

USAGE:
    spm-bootstrap clean [options]

OPTIONS:
    --build-dir PATH         Directory to remove (default: .build)
    -v, --verbose            Verbose output
`,
};

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(value: string): value is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, value);
}

export function getHelpText(command?: string): string {
  if (command && isHelpTopic(command)) {
    return HELP_TEXT[command];
  }
  return HELP_TEXT.main;
}

export function showHelp(command?: string): void {
  console.log(getHelpText(command));
}
