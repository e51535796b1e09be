export const VERSION = process.env.LEASH_VERSION ?? '0.1.0'
