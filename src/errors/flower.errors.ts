import { AppError } from './app-error';

export const FlowerError = {
  notFound: (id: string) => AppError.notFound(`Flower not found with id: ${id}`),

  invalidId: () => AppError.badRequest('Invalid flower id'),

  invalidName: (reason: string) => AppError.validation(`Invalid flower name: ${reason}`),

  invalidColor: (reason: string) => AppError.validation(`Invalid flower color: ${reason}`),

  invalidDescription: (reason: string) => AppError.validation(`Invalid flower description: ${reason}`),

  insufficientStock: () => AppError.validation('Insufficient stock'),

  stockLimitExceeded: () => AppError.validation('Stock limit exceeded'),
};
