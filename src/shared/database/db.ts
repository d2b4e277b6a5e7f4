/**
 * =============================================================================
 * DATABASE SERVICE - JSON Document Storage
 * =============================================================================
 *
 * File-backed document store for customers, providers, categories, offerings,
 * addresses, bookings and payments. With no file configured it keeps data in
 * memory only (tests, local experiments).
 *
 * All operations are synchronous. `transaction()` snapshots the document,
 * runs the unit of work and restores the snapshot if it throws, so a failed
 * transition never leaves a partial write behind.
 * =============================================================================
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import defaultCategories from '../../../data/service-categories.json';
import { logger } from '../services/logger.service';
import { config } from '../../config/environment';
import { ConflictError } from '../../core/errors/AppError';
import {
  BookingStatus,
  CallerRole,
  ErrorCode,
  PaymentMethod,
  PaymentStatus,
  SLOT_HOLDING_STATUSES
} from '../../core/constants';
import type {
  AddressRecord,
  BookingRecord,
  CategoryRecord,
  Coordinate,
  CustomerRecord,
  MarketplaceStore,
  NewAddress,
  NewBooking,
  NewCustomer,
  NewProvider,
  OfferingRecord,
  PaymentRecord,
  ProviderFilter,
  ProviderProfile,
  ProviderRecord,
  ProviderUpdate
} from './repository.interface';

// =============================================================================
// PERSISTED DOCUMENT
// =============================================================================

const coordinateSchema: z.ZodType<Coordinate> = z.object({
  latitude: z.number(),
  longitude: z.number()
});

const documentSchema = z.object({
  customers: z.array(z.object({
    id: z.string(),
    name: z.string(),
    email: z.string(),
    createdAt: z.string(),
    updatedAt: z.string()
  })),
  providers: z.array(z.object({
    id: z.string(),
    name: z.string(),
    email: z.string(),
    experienceYears: z.number(),
    isAvailable: z.boolean(),
    isVerified: z.boolean(),
    averageRating: z.number().nullable(),
    createdAt: z.string(),
    updatedAt: z.string()
  })),
  categories: z.array(z.object({
    id: z.string(),
    name: z.string(),
    description: z.string()
  })),
  offerings: z.array(z.object({
    providerId: z.string(),
    categoryId: z.string(),
    priceRate: z.number(),
    createdAt: z.string(),
    updatedAt: z.string()
  })),
  addresses: z.array(z.object({
    id: z.string(),
    ownerId: z.string(),
    ownerRole: z.nativeEnum(CallerRole),
    line: z.string(),
    city: z.string(),
    state: z.string(),
    postalCode: z.string(),
    location: coordinateSchema.nullable(),
    createdAt: z.string()
  })),
  bookings: z.array(z.object({
    id: z.string(),
    customerId: z.string(),
    providerId: z.string(),
    categoryId: z.string(),
    addressId: z.string(),
    date: z.string(),
    timeSlot: z.string(),
    status: z.nativeEnum(BookingStatus),
    rating: z.number().nullable(),
    ratingComment: z.string().nullable(),
    ratedAt: z.string().nullable(),
    createdAt: z.string(),
    updatedAt: z.string()
  })),
  payments: z.array(z.object({
    id: z.string(),
    bookingId: z.string(),
    amount: z.number(),
    method: z.nativeEnum(PaymentMethod),
    transactionId: z.string(),
    status: z.nativeEnum(PaymentStatus),
    createdAt: z.string()
  })),
  _meta: z.object({
    version: z.string(),
    lastUpdated: z.string()
  })
});

export type Database = z.infer<typeof documentSchema>;

function emptyDocument(): Database {
  return {
    customers: [],
    providers: [],
    categories: defaultCategories.map(c => ({ ...c })),
    offerings: [],
    addresses: [],
    bookings: [],
    payments: [],
    _meta: {
      version: '1.0.0',
      lastUpdated: new Date().toISOString()
    }
  };
}

export interface DatabaseOptions {
  /** JSON file to load from and save to; empty keeps data in memory */
  filePath: string;
}

/**
 * Database class - handles all CRUD operations
 */
export class DatabaseService implements MarketplaceStore {
  private data: Database;
  private readonly filePath: string;
  private saveTimeout: NodeJS.Timeout | null = null;
  private transactionDepth = 0;

  constructor(options: DatabaseOptions) {
    this.filePath = options.filePath ? path.resolve(options.filePath) : '';
    this.data = this.load();
  }

  /**
   * Load database from file
   */
  private load(): Database {
    if (!this.filePath) {
      return emptyDocument();
    }

    try {
      const dir = path.dirname(this.filePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
        logger.info(`Created database directory: ${dir}`);
      }

      if (!fs.existsSync(this.filePath)) {
        const fresh = emptyDocument();
        this.saveSync(fresh);
        return fresh;
      }

      const parsed = documentSchema.safeParse(JSON.parse(fs.readFileSync(this.filePath, 'utf-8')));
      if (!parsed.success) {
        logger.error('Database file failed validation, starting empty', {
          file: this.filePath,
          issues: parsed.error.issues.slice(0, 5).map(i => `${i.path.join('.')}: ${i.message}`)
        });
        return emptyDocument();
      }

      logger.info(`Database loaded from ${this.filePath}`, {
        providers: parsed.data.providers.length,
        bookings: parsed.data.bookings.length
      });
      return parsed.data;
    } catch (error) {
      logger.error('Failed to load database, using default', {
        error: error instanceof Error ? error.message : String(error)
      });
      return emptyDocument();
    }
  }

  /**
   * Save database to file (debounced)
   */
  private save(): void {
    if (!this.filePath || this.transactionDepth > 0) return;

    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
    }
    this.saveTimeout = setTimeout(() => {
      this.saveTimeout = null;
      this.saveSync(this.data);
    }, 100);
    this.saveTimeout.unref();
  }

  /**
   * Synchronous save
   */
  private saveSync(data: Database): void {
    try {
      data._meta.lastUpdated = new Date().toISOString();
      fs.writeFileSync(this.filePath, JSON.stringify(data, null, 2));
    } catch (error) {
      logger.error('Failed to save database', {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  /**
   * Write pending changes immediately (shutdown hook)
   */
  flush(): void {
    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
      this.saveTimeout = null;
    }
    if (this.filePath) {
      this.saveSync(this.data);
    }
  }

  // ==========================================================================
  // TRANSACTIONS
  // ==========================================================================

  /**
   * Run `work` atomically. Nested calls join the outer transaction.
   */
  transaction<T>(work: () => T): T {
    if (this.transactionDepth > 0) {
      return work();
    }

    const snapshot = structuredClone(this.data);
    this.transactionDepth++;
    try {
      const result = work();
      this.transactionDepth--;
      this.save();
      return result;
    } catch (error) {
      this.transactionDepth--;
      this.data = snapshot;
      throw error;
    }
  }

  // ==========================================================================
  // CUSTOMER OPERATIONS
  // ==========================================================================

  createCustomer(input: NewCustomer): CustomerRecord {
    const now = new Date().toISOString();
    const customer: CustomerRecord = {
      id: input.id ?? uuidv4(),
      name: input.name,
      email: input.email,
      createdAt: now,
      updatedAt: now
    };
    this.data.customers.push(customer);
    this.save();
    return { ...customer };
  }

  getCustomerById(id: string): CustomerRecord | undefined {
    const customer = this.data.customers.find(c => c.id === id);
    return customer ? { ...customer } : undefined;
  }

  // ==========================================================================
  // CATEGORY OPERATIONS
  // ==========================================================================

  listCategories(): CategoryRecord[] {
    return this.data.categories.map(c => ({ ...c }));
  }

  getCategoryById(id: string): CategoryRecord | undefined {
    const category = this.data.categories.find(c => c.id === id);
    return category ? { ...category } : undefined;
  }

  // ==========================================================================
  // PROVIDER OPERATIONS
  // ==========================================================================

  createProvider(input: NewProvider): ProviderRecord {
    const now = new Date().toISOString();
    const provider: ProviderRecord = {
      id: input.id ?? uuidv4(),
      name: input.name,
      email: input.email,
      experienceYears: input.experienceYears,
      isAvailable: input.isAvailable ?? true,
      isVerified: input.isVerified ?? false,
      averageRating: null,
      createdAt: now,
      updatedAt: now
    };
    this.data.providers.push(provider);
    this.save();
    return { ...provider };
  }

  getProviderById(id: string): ProviderRecord | undefined {
    const provider = this.data.providers.find(p => p.id === id);
    return provider ? { ...provider } : undefined;
  }

  /**
   * Providers by id, filtered, each with its own registered location
   */
  getProvidersByIds(ids: string[], filters: ProviderFilter = {}): ProviderProfile[] {
    const wanted = new Set(ids);
    return this.data.providers
      .filter(p => wanted.has(p.id))
      .filter(p => filters.isAvailable === undefined || p.isAvailable === filters.isAvailable)
      .filter(p => filters.isVerified === undefined || p.isVerified === filters.isVerified)
      .map(p => ({
        id: p.id,
        name: p.name,
        experienceYears: p.experienceYears,
        isAvailable: p.isAvailable,
        isVerified: p.isVerified,
        averageRating: p.averageRating,
        location: this.getLocation(p.id, CallerRole.PROVIDER)
      }));
  }

  updateProvider(id: string, updates: ProviderUpdate): ProviderRecord | undefined {
    const provider = this.data.providers.find(p => p.id === id);
    if (!provider) return undefined;

    Object.assign(provider, updates, { updatedAt: new Date().toISOString() });
    this.save();
    return { ...provider };
  }

  updateProviderRating(id: string, averageRating: number | null): ProviderRecord | undefined {
    const provider = this.data.providers.find(p => p.id === id);
    if (!provider) return undefined;

    provider.averageRating = averageRating;
    provider.updatedAt = new Date().toISOString();
    this.save();
    return { ...provider };
  }

  // ==========================================================================
  // OFFERING OPERATIONS
  // ==========================================================================

  createOffering(providerId: string, categoryId: string, priceRate: number): OfferingRecord {
    if (this.data.offerings.some(o => o.providerId === providerId && o.categoryId === categoryId)) {
      throw new ConflictError(
        'Provider already offers this category',
        ErrorCode.OFFERING_ALREADY_EXISTS,
        { providerId, categoryId }
      );
    }

    const now = new Date().toISOString();
    const offering: OfferingRecord = { providerId, categoryId, priceRate, createdAt: now, updatedAt: now };
    this.data.offerings.push(offering);
    this.save();
    return { ...offering };
  }

  getOffering(providerId: string, categoryId: string): OfferingRecord | undefined {
    const offering = this.data.offerings.find(o => o.providerId === providerId && o.categoryId === categoryId);
    return offering ? { ...offering } : undefined;
  }

  getOfferingsByCategory(categoryId: string): OfferingRecord[] {
    return this.data.offerings.filter(o => o.categoryId === categoryId).map(o => ({ ...o }));
  }

  getOfferingsByProvider(providerId: string): OfferingRecord[] {
    return this.data.offerings.filter(o => o.providerId === providerId).map(o => ({ ...o }));
  }

  updateOfferingPrice(providerId: string, categoryId: string, priceRate: number): OfferingRecord | undefined {
    const offering = this.data.offerings.find(o => o.providerId === providerId && o.categoryId === categoryId);
    if (!offering) return undefined;

    offering.priceRate = priceRate;
    offering.updatedAt = new Date().toISOString();
    this.save();
    return { ...offering };
  }

  deleteOffering(providerId: string, categoryId: string): boolean {
    const index = this.data.offerings.findIndex(o => o.providerId === providerId && o.categoryId === categoryId);
    if (index < 0) return false;

    this.data.offerings.splice(index, 1);
    this.save();
    return true;
  }

  // ==========================================================================
  // ADDRESS OPERATIONS
  // ==========================================================================

  createAddress(input: NewAddress): AddressRecord {
    const address: AddressRecord = {
      ...input,
      location: input.location ? { ...input.location } : null,
      id: uuidv4(),
      createdAt: new Date().toISOString()
    };
    this.data.addresses.push(address);
    this.save();
    return { ...address };
  }

  getAddressById(id: string): AddressRecord | undefined {
    const address = this.data.addresses.find(a => a.id === id);
    return address ? { ...address } : undefined;
  }

  getAddressesByOwner(ownerId: string): AddressRecord[] {
    return this.data.addresses.filter(a => a.ownerId === ownerId).map(a => ({ ...a }));
  }

  getLocation(entityId: string, ownerRole?: CallerRole): Coordinate | null {
    const byId = this.data.addresses.find(a => a.id === entityId);
    if (byId) {
      return byId.location ? { ...byId.location } : null;
    }

    // Customer and provider ids share one namespace; scope by role when given
    const owned = this.data.addresses.find(a =>
      a.ownerId === entityId &&
      (ownerRole === undefined || a.ownerRole === ownerRole) &&
      a.location !== null
    );
    return owned?.location ? { ...owned.location } : null;
  }

  // ==========================================================================
  // BOOKING OPERATIONS
  // ==========================================================================

  createBooking(input: NewBooking): BookingRecord {
    const now = new Date().toISOString();
    const booking: BookingRecord = {
      ...input,
      id: uuidv4(),
      status: BookingStatus.PENDING,
      rating: null,
      ratingComment: null,
      ratedAt: null,
      createdAt: now,
      updatedAt: now
    };
    this.data.bookings.push(booking);
    this.save();
    return { ...booking };
  }

  getBooking(id: string): BookingRecord | undefined {
    const booking = this.data.bookings.find(b => b.id === id);
    return booking ? { ...booking } : undefined;
  }

  getBookingsByCustomer(customerId: string, status?: BookingStatus): BookingRecord[] {
    return this.data.bookings
      .filter(b => b.customerId === customerId && (status === undefined || b.status === status))
      .map(b => ({ ...b }));
  }

  getBookingsByProvider(providerId: string, status?: BookingStatus): BookingRecord[] {
    return this.data.bookings
      .filter(b => b.providerId === providerId && (status === undefined || b.status === status))
      .map(b => ({ ...b }));
  }

  updateBookingStatus(id: string, expected: BookingStatus, next: BookingStatus): boolean {
    const booking = this.data.bookings.find(b => b.id === id);
    if (!booking || booking.status !== expected) return false;

    booking.status = next;
    booking.updatedAt = new Date().toISOString();
    this.save();
    return true;
  }

  setBookingRating(id: string, rating: number, comment: string | null): boolean {
    const booking = this.data.bookings.find(b => b.id === id);
    if (!booking || booking.status !== BookingStatus.COMPLETED || booking.rating !== null) return false;

    const now = new Date().toISOString();
    booking.rating = rating;
    booking.ratingComment = comment;
    booking.ratedAt = now;
    booking.updatedAt = now;
    this.save();
    return true;
  }

  getCompletedRatedBookingsForProvider(providerId: string): BookingRecord[] {
    return this.data.bookings
      .filter(b => b.providerId === providerId && b.status === BookingStatus.COMPLETED && b.rating !== null)
      .map(b => ({ ...b }));
  }

  findSlotHoldingBooking(providerId: string, date: string, timeSlot: string): BookingRecord | undefined {
    const booking = this.data.bookings.find(b =>
      b.providerId === providerId &&
      b.date === date &&
      b.timeSlot === timeSlot &&
      SLOT_HOLDING_STATUSES.includes(b.status)
    );
    return booking ? { ...booking } : undefined;
  }

  // ==========================================================================
  // PAYMENT OPERATIONS
  // ==========================================================================

  createPayment(bookingId: string, amount: number, method: PaymentMethod): PaymentRecord {
    if (this.data.payments.some(p => p.bookingId === bookingId)) {
      throw new ConflictError(
        'Payment already recorded for this booking',
        ErrorCode.PAYMENT_ALREADY_RECORDED,
        { bookingId }
      );
    }

    const payment: PaymentRecord = {
      id: uuidv4(),
      bookingId,
      amount,
      method,
      transactionId: `TXN-${uuidv4().replace(/-/g, '').slice(0, 16).toUpperCase()}`,
      status: PaymentStatus.RECORDED,
      createdAt: new Date().toISOString()
    };
    this.data.payments.push(payment);
    this.save();
    return { ...payment };
  }

  getPaymentByBooking(bookingId: string): PaymentRecord | undefined {
    const payment = this.data.payments.find(p => p.bookingId === bookingId);
    return payment ? { ...payment } : undefined;
  }

  /**
   * Counts for the health endpoint
   */
  getStats() {
    return {
      customers: this.data.customers.length,
      providers: this.data.providers.length,
      offerings: this.data.offerings.length,
      bookings: this.data.bookings.length,
      payments: this.data.payments.length
    };
  }
}

export const db = new DatabaseService({ filePath: config.dataFile });
