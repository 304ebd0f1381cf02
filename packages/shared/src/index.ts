export * from './schemas/index'
