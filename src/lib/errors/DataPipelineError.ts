import { AppError } from './AppError';

/**
 * Raised when a request object handed to the data pipeline is missing or
 * malformed. The one error that handlers and brokers let escape: everything
 * else is logged and turned into a failure result.
 */
export class DataPipelineError extends AppError {
  constructor(message: string) {
    super(message, 'DATA_PIPELINE_ERROR');
  }
}
