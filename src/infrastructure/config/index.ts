export { Environment, EnvironmentVariables, LOG_LEVELS, validate } from './env.validation';
export { SWAGGER_PATH, setupSwagger } from './swagger.config';
