import pino from 'pino'

const level = process.env.LOG_LEVEL || 'info'

// stdout carries the response body, so logs go to stderr
const logger = process.env.ENVIRONMENT === 'development'
  ? pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2
        }
      }
    })
  : pino({ level }, pino.destination(2))

export default logger
