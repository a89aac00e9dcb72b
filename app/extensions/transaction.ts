import ApiExtension, { ExtensionName, ExtensionOptions } from './extension';
import type StacApi from '../api';
import { AsyncTransactionsClient, TransactionsClient } from '../clients/transaction';
import { addTransactionRoutes } from '../frontends/transactions';

export const TRANSACTION_CONFORMANCE_CLASSES = [
  'https://api.stacspec.org/v1.0.0/ogcapi-features/extensions/transaction',
  'https://api.stacspec.org/v1.0.0/collections/extensions/transaction',
];

/**
 * Adds routes creating, replacing and deleting items and collections
 */
export default class TransactionExtension extends ApiExtension {
  readonly name = ExtensionName.TRANSACTION;

  readonly client: TransactionsClient | AsyncTransactionsClient;

  /**
   * @param client - the backend performing the changes
   * @param options - overrides of the defaults
   */
  constructor(client: TransactionsClient | AsyncTransactionsClient, options: ExtensionOptions = {}) {
    super(TRANSACTION_CONFORMANCE_CLASSES, {}, options);
    this.client = client;
  }

  register(api: StacApi): void {
    addTransactionRoutes(api, this.client);
  }
}
