import { InvoiceController } from '../../src/controllers/financial/invoice.controller';
import { ClientRecord } from '../../src/models/business/client.model';
import { InvoiceView } from '../../src/models/financial/invoice.model';
import { ClientService } from '../../src/services/business/client.service';
import { InvoicePdfService } from '../../src/services/financial/invoice-pdf.service';
import { InvoiceService } from '../../src/services/financial/invoice.service';
import { RenderError } from '../../src/utils/errors';
import { InMemoryClientStore, InMemoryInvoiceStore } from '../helpers/in-memory-stores';
import { buildClientDto, buildInvoiceDto, CREATED_AT } from '../helpers/fixtures';
import { mockRequest, mockResponse } from '../helpers/http-mocks';
import { TEST_USER_ID } from '../setup';

const MISSING_ID = '00000000-0000-4000-8000-000000000000';

describe('InvoiceController', () => {
  let pdfService: InvoicePdfService;
  let invoiceService: InvoiceService;
  let controller: InvoiceController;
  let client: ClientRecord;

  beforeEach(async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const clientStore = new InMemoryClientStore();
    const invoiceStore = new InMemoryInvoiceStore(clientStore);
    pdfService = new InvoicePdfService();
    invoiceService = new InvoiceService(invoiceStore, clientStore, pdfService, { clock: () => CREATED_AT });
    controller = new InvoiceController(invoiceService);
    client = await new ClientService(clientStore, invoiceStore, () => CREATED_AT).create(
      TEST_USER_ID,
      buildClientDto(),
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  async function createInvoice(): Promise<InvoiceView> {
    return invoiceService.create(TEST_USER_ID, buildInvoiceDto(client.id));
  }

  describe('create', () => {
    it('should respond 201 with the computed totals', async () => {
      const { res, status, json } = mockResponse(TEST_USER_ID);

      await controller.create(mockRequest({ body: buildInvoiceDto(client.id) }), res);

      expect(status).toHaveBeenCalledWith(201);
      const body: InvoiceView = json.mock.calls[0][0];
      expect(body.subtotal).toBe('600');
      expect(body.tax).toBe('60');
      expect(body.total).toBe('660');
      expect(body.status).toBe('draft');
    });

    it('should respond 404 for an unknown client', async () => {
      const { res, status, json } = mockResponse(TEST_USER_ID);

      await controller.create(mockRequest({ body: buildInvoiceDto(MISSING_ID) }), res);

      expect(status).toHaveBeenCalledWith(404);
      expect(json).toHaveBeenCalledWith({ message: 'Client not found', code: 'NOT_FOUND' });
    });

    it('should respond 401 when no user is authenticated', async () => {
      const { res, status, json } = mockResponse();

      await controller.create(mockRequest({ body: buildInvoiceDto(client.id) }), res);

      expect(status).toHaveBeenCalledWith(401);
      expect(json).toHaveBeenCalledWith({ message: 'Authentication required', code: 'AUTHENTICATION_ERROR' });
    });
  });

  describe('findAll', () => {
    it('should pass a known status filter and ignore an unknown one', async () => {
      const invoice = await createInvoice();
      await invoiceService.markSent(invoice.id, TEST_USER_ID);

      const sent = mockResponse(TEST_USER_ID);
      await controller.findAll(mockRequest({ query: { status: 'sent' } }), sent.res);
      const drafts = mockResponse(TEST_USER_ID);
      await controller.findAll(mockRequest({ query: { status: 'draft' } }), drafts.res);
      const unknown = mockResponse(TEST_USER_ID);
      await controller.findAll(mockRequest({ query: { status: 'archived' } }), unknown.res);

      expect(sent.json.mock.calls[0][0]).toHaveLength(1);
      expect(drafts.json.mock.calls[0][0]).toEqual([]);
      expect(unknown.json.mock.calls[0][0]).toHaveLength(1);
    });
  });

  describe('findById', () => {
    it('should respond 404 for an unknown invoice', async () => {
      const { res, status, json } = mockResponse(TEST_USER_ID);

      await controller.findById(mockRequest({ params: { id: MISSING_ID } }), res);

      expect(status).toHaveBeenCalledWith(404);
      expect(json).toHaveBeenCalledWith({ message: 'Invoice not found', code: 'NOT_FOUND' });
    });
  });

  describe('update', () => {
    it('should respond 400 with the validation details', async () => {
      const invoice = await createInvoice();
      const { res, status, json } = mockResponse(TEST_USER_ID);

      await controller.update(mockRequest({ params: { id: invoice.id }, body: { due_date: '2024-01-01' } }), res);

      expect(status).toHaveBeenCalledWith(400);
      expect(json).toHaveBeenCalledWith({
        message: 'Invalid invoice update: Due date cannot be before invoice date',
        code: 'VALIDATION_ERROR',
        details: ['Due date cannot be before invoice date'],
      });
    });
  });

  describe('lifecycle', () => {
    it('should mark the invoice sent and then paid', async () => {
      const invoice = await createInvoice();
      const sent = mockResponse(TEST_USER_ID);
      const paid = mockResponse(TEST_USER_ID);

      await controller.markSent(mockRequest({ params: { id: invoice.id } }), sent.res);
      await controller.markPaid(mockRequest({ params: { id: invoice.id } }), paid.res);

      expect(sent.status).toHaveBeenCalledWith(200);
      expect(sent.json.mock.calls[0][0].status).toBe('sent');
      expect(paid.json.mock.calls[0][0].status).toBe('paid');
    });
  });

  describe('delete', () => {
    it('should respond 204 without a body', async () => {
      const invoice = await createInvoice();
      const { res, status, send } = mockResponse(TEST_USER_ID);

      await controller.delete(mockRequest({ params: { id: invoice.id } }), res);

      expect(status).toHaveBeenCalledWith(204);
      expect(send).toHaveBeenCalledWith();
    });
  });

  describe('generatePDF', () => {
    it('should send the document as an attachment', async () => {
      const invoice = await createInvoice();
      const { res, setHeader, send } = mockResponse(TEST_USER_ID);

      await controller.generatePDF(mockRequest({ params: { id: invoice.id } }), res);

      const content: Buffer = send.mock.calls[0][0];
      expect(content.subarray(0, 5).toString('latin1')).toBe('%PDF-');
      expect(setHeader).toHaveBeenCalledWith('Content-Type', 'application/pdf');
      expect(setHeader).toHaveBeenCalledWith('Content-Disposition', 'attachment; filename="invoice-INV-2024-001.pdf"');
      expect(setHeader).toHaveBeenCalledWith('Content-Length', content.length);
    });

    it('should respond 500 with the render error', async () => {
      const invoice = await createInvoice();
      jest.spyOn(pdfService, 'export').mockRejectedValue(new RenderError('Failed to render invoice PDF: font missing'));
      const { res, status, json, send } = mockResponse(TEST_USER_ID);

      await controller.generatePDF(mockRequest({ params: { id: invoice.id } }), res);

      expect(status).toHaveBeenCalledWith(500);
      expect(json).toHaveBeenCalledWith({
        message: 'Failed to render invoice PDF: font missing',
        code: 'RENDER_ERROR',
      });
      expect(send).not.toHaveBeenCalled();
    });
  });
});
