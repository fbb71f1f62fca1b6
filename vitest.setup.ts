// The library never writes to the console, so any output during a test fails it.
const trapped = ['error', 'warn', 'info', 'log', 'debug'] as const

const originals = trapped.map(method => [method, console[method]] as const)

beforeAll(() => {
    for (const [method, original] of originals) {
        console[method] = (...args: unknown[]) => {
            original(...args)
            throw new Error(`console.${method} called in tests: ${args.join(' ')}`)
        }
    }
})

afterAll(() => {
    for (const [method, original] of originals) {
        console[method] = original
    }
})
