const STATUS = Symbol.for('status')

const serviceName = process.env.SERVICE_NAME || 'weft'

export { STATUS, serviceName }
