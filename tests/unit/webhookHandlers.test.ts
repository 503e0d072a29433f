import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PaystackAdapter, computePaystackSignature } from '../../src/adapters/paystackAdapter';
import { PaymentNotifier } from '../../src/domain/notifications/notifier';
import type { ManualReconcileDeps } from '../../src/domain/payments/reconciler';
import { handler as squadHandler } from '../../src/functions/squadWebhookHandler';
import { handler as paystackHandler } from '../../src/functions/paystackWebhookHandler';
import type { RegistrationRecord } from '../../src/types/tables';
import { InMemoryRegistrationStore } from '../support/inMemoryRegistrationStore';
import { FakeGateway, FixedRate, RecordingSender, TEST_SETTINGS, makeRegistration } from '../support/fakes';
import { httpEvent, lambdaContext } from '../support/lambda';

const mockGetConfig = vi.fn();
const mockBuildReconcilerDeps = vi.fn();

vi.mock('../../src/lib/config', () => ({
  getConfig: () => mockGetConfig(),
}));
vi.mock('../../src/lib/services', () => ({
  buildReconcilerDeps: (...args: unknown[]) => mockBuildReconcilerDeps(...args),
  getPaystackAdapter: () => new PaystackAdapter('https://paystack.test', 'test-secret', 1000),
}));

describe('gateway webhook handlers', () => {
  let reg: RegistrationRecord;
  let store: InMemoryRegistrationStore;
  let deps: ManualReconcileDeps;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    reg = makeRegistration({ cohortCode: 'C1' });
    store = new InMemoryRegistrationStore().seed(reg);
    deps = {
      store,
      exchangeRate: new FixedRate(1500),
      notifier: new PaymentNotifier(new RecordingSender(), TEST_SETTINGS),
      maxRetries: 5,
      gateways: { squad: new FakeGateway('squad'), paystack: new FakeGateway('paystack') },
    };
    mockGetConfig.mockReturnValue({ paystackSecretKey: 'test-secret' });
    mockBuildReconcilerDeps.mockResolvedValue(deps);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Squad', () => {
    function squadBody(reference: string, status = 'Success', event = 'charge_successful'): string {
      return JSON.stringify({
        Event: event,
        TransactionRef: reference,
        Body: {
          transaction_ref: reference,
          transaction_status: status,
          amount: 7500000,
          currency: 'NGN',
          meta: { exchange_rate: '1500' },
          transaction_type: 'Card',
        },
      });
    }

    it('reconciles a successful charge and answers in plain text', async () => {
      const ref = `ASPIR-REG-${reg.registrationId}-a1b2c3d4`;

      const res = await squadHandler(httpEvent({ body: squadBody(ref) }), lambdaContext());

      expect(res).toEqual({
        statusCode: 200,
        headers: { 'Content-Type': 'text/plain', 'X-Correlation-Id': 'req-1' },
        body: 'Webhook processed successfully',
      });
      expect(store.registrations.get(reg.registrationId)).toMatchObject({ registrationFeePaid: true, status: 'PENDING' });
    });

    it('answers Already processed for a replay', async () => {
      const ref = `ASPIR-REG-${reg.registrationId}-a1b2c3d4`;
      await squadHandler(httpEvent({ body: squadBody(ref) }), lambdaContext());
      const res = await squadHandler(httpEvent({ body: squadBody(ref) }), lambdaContext());
      expect(res.body).toBe('Already processed');
      expect(store.transactions.size).toBe(1);
    });

    it('records a failed charge', async () => {
      const ref = `ASPIR-REG-${reg.registrationId}-a1b2c3d4`;
      const res = await squadHandler(httpEvent({ body: squadBody(ref, 'Failed') }), lambdaContext());
      expect([res.statusCode, res.body]).toEqual([200, 'Transaction failed']);
      expect(store.registrations.get(reg.registrationId)?.status).toBe('FAILED');
    });

    it('acknowledges events it does not act on', async () => {
      const res = await squadHandler(httpEvent({ body: squadBody('X', 'Success', 'refund_processed') }), lambdaContext());
      expect([res.statusCode, res.body]).toEqual([200, 'Event not handled']);
      expect(mockBuildReconcilerDeps).not.toHaveBeenCalled();
    });

    it('maps bad input and unknown registrations to 400 and 404', async () => {
      const invalid = await squadHandler(httpEvent({ body: '{not json' }), lambdaContext());
      expect([invalid.statusCode, invalid.body]).toEqual([400, 'Invalid JSON']);

      const noRef = await squadHandler(httpEvent({ body: JSON.stringify({ Event: 'charge_successful', Body: {} }) }), lambdaContext());
      expect([noRef.statusCode, noRef.body]).toEqual([400, 'Missing transaction reference']);

      const unknown = await squadHandler(httpEvent({ body: squadBody('ASPIR-REG-unknown') }), lambdaContext());
      expect([unknown.statusCode, unknown.body]).toEqual([404, 'Registration not found']);
    });

    it('answers 500 when processing fails unexpectedly', async () => {
      mockBuildReconcilerDeps.mockRejectedValueOnce(new Error('Missing required env: REGISTRATIONS_TABLE'));
      const res = await squadHandler(httpEvent({ body: squadBody(`ASPIR-REG-${reg.registrationId}`) }), lambdaContext());
      expect([res.statusCode, res.body]).toEqual([500, 'Internal server error']);
    });
  });

  describe('Paystack', () => {
    function paystackBody(reference: string, event = 'charge.success'): string {
      return JSON.stringify({
        event,
        data: { reference, status: 'success', amount: 22500000, currency: 'NGN', channel: 'card', metadata: { exchange_rate: '1500' } },
      });
    }

    function signed(body: string, base64 = false) {
      return httpEvent({
        body: base64 ? Buffer.from(body).toString('base64') : body,
        isBase64Encoded: base64,
        headers: { 'X-Paystack-Signature': computePaystackSignature(body, 'test-secret') },
      });
    }

    it('verifies the signature and reconciles a full payment', async () => {
      const ref = `ASPIR-FULL-${reg.registrationId}-0f0f0f0f`;

      const res = await paystackHandler(signed(paystackBody(ref)), lambdaContext());

      expect([res.statusCode, res.body]).toEqual([200, 'Webhook processed successfully']);
      expect(store.registrations.get(reg.registrationId)).toMatchObject({ status: 'PAID', participantId: 'ET/ASPIR/C1/001' });
    });

    it('verifies the signature of a base64-encoded event', async () => {
      const ref = `ASPIR-FULL-${reg.registrationId}-0f0f0f0f`;
      const res = await paystackHandler(signed(paystackBody(ref), true), lambdaContext());
      expect(res.statusCode).toBe(200);
    });

    it('checks the signature over the raw bytes of a base64 body that is not valid UTF-8', async () => {
      const bytes = Buffer.concat([
        Buffer.from('{"event":"transfer.success","data":{"reference":"R","customer":"Caf'),
        Buffer.from([0xe9]),
        Buffer.from('"}}'),
      ]);
      const event = httpEvent({
        body: bytes.toString('base64'),
        isBase64Encoded: true,
        headers: { 'X-Paystack-Signature': computePaystackSignature(bytes, 'test-secret') },
      });

      const res = await paystackHandler(event, lambdaContext());

      expect([res.statusCode, res.body]).toEqual([200, 'Event not handled']);
    });

    it('rejects a missing or wrong signature with 401 before parsing', async () => {
      const body = paystackBody(`ASPIR-FULL-${reg.registrationId}`);
      const unsigned = await paystackHandler(httpEvent({ body }), lambdaContext());
      expect([unsigned.statusCode, unsigned.body]).toEqual([401, 'Invalid signature']);

      const forged = await paystackHandler(
        httpEvent({ body, headers: { 'x-paystack-signature': computePaystackSignature(body, 'other-secret') } }),
        lambdaContext()
      );
      expect(forged.statusCode).toBe(401);
      expect(store.commitCalls).toBe(0);
    });

    it('acknowledges other events and rejects malformed bodies', async () => {
      const ignored = await paystackHandler(signed(paystackBody('R', 'transfer.success')), lambdaContext());
      expect([ignored.statusCode, ignored.body]).toEqual([200, 'Event not handled']);

      const invalid = await paystackHandler(signed('not json'), lambdaContext());
      expect([invalid.statusCode, invalid.body]).toEqual([400, 'Invalid JSON']);
    });
  });
});
