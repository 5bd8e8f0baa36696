/**
 * SES Query Mailer Examples
 *
 * Run with AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY and AWS_REGION set.
 */

import {
  ApiError,
  ConsoleLogger,
  EmailBuilder,
  LogLevel,
  PooledTransport,
  SesClient,
  TransportError,
  parseErrorResponse,
  parseSendResponse,
} from '../src/index.js';

/**
 * Example 1: Plain text email with the default fetch transport
 */
async function exampleTextEmail(client: SesClient): Promise<void> {
  const xml = await client.sendEmail({
    from: 'sender@example.com',
    to: ['recipient@example.com'],
    subject: 'Hello from SES',
    body: 'This is a plain text email',
  });

  console.log('Message ID:', parseSendResponse(xml).messageId);
}

/**
 * Example 2: HTML email from the fluent builder
 */
async function exampleHtmlEmail(client: SesClient): Promise<void> {
  const intent = new EmailBuilder()
    .from('sender@example.com', 'Example Sender')
    .to('recipient@example.com')
    .cc('team@example.com')
    .subject('Weekly report')
    .text('Your report is ready.')
    .html('<p>Your report is <strong>ready</strong>.</p>')
    .build();

  const xml = await client.send(intent);
  console.log('Message ID:', parseSendResponse(xml).messageId);
}

/**
 * Example 3: Raw MIME message over a pooled connection
 */
async function exampleRawEmail(): Promise<void> {
  const logger = new ConsoleLogger(LogLevel.Debug);
  const probe = SesClient.fromEnv();
  const transport = new PooledTransport(probe.config.endpoint, { connections: 4 });

  try {
    const client = SesClient.fromEnv({ transport, logger });
    const mime = [
      'From: sender@example.com',
      'To: recipient@example.com',
      'Subject: Raw message',
      'Content-Type: text/plain; charset=UTF-8',
      '',
      'Sent as raw MIME.',
      '',
    ].join('\r\n');

    const xml = await client.sendRawEmail(new TextEncoder().encode(mime));
    console.log('Message ID:', parseSendResponse(xml).messageId);
  } finally {
    await transport.close();
  }
}

async function main(): Promise<void> {
  const client = SesClient.fromEnv();

  try {
    await exampleTextEmail(client);
    await exampleHtmlEmail(client);
    await exampleRawEmail();
  } catch (error) {
    if (error instanceof ApiError) {
      const details = parseErrorResponse(error.body);
      console.error(`SES rejected the request (${error.statusCode}):`, details?.code ?? error.body);
    } else if (error instanceof TransportError) {
      console.error('Could not reach SES:', error.message);
    } else {
      throw error;
    }
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
