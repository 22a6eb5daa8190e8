/**
 * AWS Lambda handler wrapper for Express server
 * This file adapts the Express app to work as a Lambda function
 */
import serverless from 'serverless-http';
import { createApp, createService } from './app';
import { loadConfig } from './config';

const config = loadConfig();
const app = createApp(createService(config), config);

// Wrap Express app for Lambda with error handling
const serverlessHandler = serverless(app);

export interface LambdaResponse {
  statusCode: number;
  headers?: Record<string, string>;
  body: string;
  isBase64Encoded?: boolean;
}

const stringHeaders = (headers: unknown): Record<string, string> | undefined => {
  if (typeof headers !== 'object' || headers === null) return undefined;
  return Object.fromEntries(
    Object.entries(headers).filter((entry): entry is [string, string] => typeof entry[1] === 'string'),
  );
};

// serverless-http types its result as a bare Object
const toLambdaResponse = (result: unknown): LambdaResponse => {
  if (
    typeof result !== 'object' ||
    result === null ||
    !('statusCode' in result) ||
    typeof result.statusCode !== 'number' ||
    !('body' in result) ||
    typeof result.body !== 'string'
  ) {
    throw new Error('Unexpected response shape from serverless-http');
  }
  return {
    statusCode: result.statusCode,
    headers: 'headers' in result ? stringHeaders(result.headers) : undefined,
    body: result.body,
    isBase64Encoded: 'isBase64Encoded' in result && result.isBase64Encoded === true,
  };
};

export const handler = async (event: object, context: object): Promise<LambdaResponse> => {
  try {
    return toLambdaResponse(await serverlessHandler(event, context));
  } catch (error) {
    console.error('[LAMBDA HANDLER] Unhandled error:', error);
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    return {
      statusCode: 500,
      headers: {
        'Access-Control-Allow-Origin': '*',
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        error: 'Internal server error',
        message: errorMessage,
      }),
    };
  }
};
