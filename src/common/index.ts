// Decorators
export * from './decorators/authenticated.decorator';
export * from './decorators/current-user.decorator';
export * from './decorators/roles.decorator';

// DTOs
export * from './dto/pagination.dto';

// Exceptions
export * from './exceptions/conflict';
export * from './exceptions/referential-violation.exception';

// Pipes
export * from './pipes/validation.pipe';

// Filters
export * from './filters/http-exception.filter';

// Guards
export * from './guards/actor.guard';
export * from './guards/api-key.guard';
export * from './guards/roles.guard';

// Interceptors
export * from './interceptors/logging.interceptor';

// Utils
export * from './utils/pagination.utils';
export * from './utils/roles.utils';
export * from './utils/validation.utils';
