/**
 * =============================================================================
 * REPOSITORY INTERFACE - Database Abstraction Layer
 * =============================================================================
 *
 * Record shapes and the store contracts the matching engine and the booking
 * state machine depend on. The JSON document store (db.ts) implements all of
 * them; a SQL implementation only has to honour the same contracts:
 *
 *   - updateBookingStatus is a compare-and-swap on status
 *   - setBookingRating only writes when no rating is present
 *   - createPayment fails for a booking that already has a payment
 *   - transaction() applies all or none of its writes
 *
 * Store calls are synchronous; the services around them are async.
 * =============================================================================
 */

import {
  BookingStatus,
  CallerRole,
  PaymentMethod,
  PaymentStatus
} from '../../core/constants';

// =============================================================================
// RECORD SHAPES
// =============================================================================

/**
 * Signed decimal degrees. An unknown location is `null`, never 0/0.
 */
export interface Coordinate {
  latitude: number;
  longitude: number;
}

export interface CustomerRecord {
  id: string;
  name: string;
  email: string;
  createdAt: string;
  updatedAt: string;
}

export interface ProviderRecord {
  id: string;
  name: string;
  email: string;
  experienceYears: number;
  isAvailable: boolean;
  isVerified: boolean;
  /** Mean of completed+rated bookings, 2 decimals; null until first rating */
  averageRating: number | null;
  createdAt: string;
  updatedAt: string;
}

/**
 * Provider as seen by the matcher: its record plus its own registered location
 */
export interface ProviderProfile {
  id: string;
  name: string;
  experienceYears: number;
  isAvailable: boolean;
  isVerified: boolean;
  averageRating: number | null;
  location: Coordinate | null;
}

export interface CategoryRecord {
  id: string;
  name: string;
  description: string;
}

export interface OfferingRecord {
  providerId: string;
  categoryId: string;
  priceRate: number;
  createdAt: string;
  updatedAt: string;
}

export interface AddressRecord {
  id: string;
  ownerId: string;
  ownerRole: CallerRole;
  line: string;
  city: string;
  state: string;
  postalCode: string;
  location: Coordinate | null;
  createdAt: string;
}

export interface BookingRecord {
  id: string;
  customerId: string;
  providerId: string;
  categoryId: string;
  addressId: string;
  /** YYYY-MM-DD */
  date: string;
  /** HH:MM-HH:MM */
  timeSlot: string;
  status: BookingStatus;
  rating: number | null;
  ratingComment: string | null;
  ratedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface PaymentRecord {
  id: string;
  bookingId: string;
  amount: number;
  method: PaymentMethod;
  transactionId: string;
  status: PaymentStatus;
  createdAt: string;
}

// =============================================================================
// INPUT SHAPES
// =============================================================================

export type NewCustomer = Pick<CustomerRecord, 'name' | 'email'> & { id?: string };

export type NewProvider = Pick<ProviderRecord, 'name' | 'email' | 'experienceYears'> & {
  id?: string;
  isAvailable?: boolean;
  isVerified?: boolean;
};

export type NewAddress = Omit<AddressRecord, 'id' | 'createdAt'>;

export type NewBooking = Pick<
  BookingRecord,
  'customerId' | 'providerId' | 'categoryId' | 'addressId' | 'date' | 'timeSlot'
>;

export interface ProviderFilter {
  isAvailable?: boolean;
  isVerified?: boolean;
}

export type ProviderUpdate = Partial<Pick<ProviderRecord, 'name' | 'experienceYears' | 'isAvailable' | 'isVerified'>>;

// =============================================================================
// STORE CONTRACTS
// =============================================================================

/**
 * All-or-nothing unit of work
 */
export interface UnitOfWork {
  transaction<T>(work: () => T): T;
}

export interface CustomerStore {
  createCustomer(input: NewCustomer): CustomerRecord;
  getCustomerById(id: string): CustomerRecord | undefined;
}

export interface CatalogStore {
  listCategories(): CategoryRecord[];
  getCategoryById(id: string): CategoryRecord | undefined;
}

export interface ProviderStore {
  createProvider(input: NewProvider): ProviderRecord;
  getProviderById(id: string): ProviderRecord | undefined;
  getProvidersByIds(ids: string[], filters?: ProviderFilter): ProviderProfile[];
  updateProvider(id: string, updates: ProviderUpdate): ProviderRecord | undefined;
  updateProviderRating(id: string, averageRating: number | null): ProviderRecord | undefined;

  createOffering(providerId: string, categoryId: string, priceRate: number): OfferingRecord;
  getOffering(providerId: string, categoryId: string): OfferingRecord | undefined;
  getOfferingsByCategory(categoryId: string): OfferingRecord[];
  getOfferingsByProvider(providerId: string): OfferingRecord[];
  updateOfferingPrice(providerId: string, categoryId: string, priceRate: number): OfferingRecord | undefined;
  deleteOffering(providerId: string, categoryId: string): boolean;

  /**
   * Location of an address id, or the first located address an owner
   * registered. `ownerRole` limits the owner lookup to addresses held in
   * that role.
   */
  getLocation(entityId: string, ownerRole?: CallerRole): Coordinate | null;
}

export interface AddressStore {
  createAddress(input: NewAddress): AddressRecord;
  getAddressById(id: string): AddressRecord | undefined;
  getAddressesByOwner(ownerId: string): AddressRecord[];
}

export interface BookingStore {
  createBooking(input: NewBooking): BookingRecord;
  getBooking(id: string): BookingRecord | undefined;
  getBookingsByCustomer(customerId: string, status?: BookingStatus): BookingRecord[];
  getBookingsByProvider(providerId: string, status?: BookingStatus): BookingRecord[];
  /** Compare-and-swap: writes only when the current status is `expected` */
  updateBookingStatus(id: string, expected: BookingStatus, next: BookingStatus): boolean;
  /** Writes only on a completed booking that has no rating yet */
  setBookingRating(id: string, rating: number, comment: string | null): boolean;
  getCompletedRatedBookingsForProvider(providerId: string): BookingRecord[];
  findSlotHoldingBooking(providerId: string, date: string, timeSlot: string): BookingRecord | undefined;
}

export interface PaymentStore {
  /** One payment per booking; a second call throws ConflictError */
  createPayment(bookingId: string, amount: number, method: PaymentMethod): PaymentRecord;
  getPaymentByBooking(bookingId: string): PaymentRecord | undefined;
}

export type MarketplaceStore =
  UnitOfWork & CustomerStore & CatalogStore & ProviderStore & AddressStore & BookingStore & PaymentStore;
