import { IncludedIndex, boolAttr, numberAttrAsString, resolveRelated, stringAttr } from '../jsonapi/accessors';
import { Resource } from '../jsonapi/document';
import { AttributeFlag, RelationshipFlag, defineResource } from '../commands/resource-commands';
import { firstNonEmpty, formatBool, formatRelated } from '../output/format';
import { booleanFilter } from './shared';

export interface CustomerRow {
  id: string;
  name: string;
  broker_id: string;
  broker_name: string;
  is_active: boolean;
}

export interface CustomerDetails extends CustomerRow {
  phone_number: string;
  company_address: string;
  company_url: string;
  notes: string;
  credit_limit: string;
  credit_type: string;
  default_payment_terms: string;
  is_trucking_company: boolean;
  requires_union_drivers: boolean;
  developer_id: string;
  developer_name: string;
}

export function buildCustomerRow(resource: Resource, included: IncludedIndex): CustomerRow {
  const broker = resolveRelated(resource, included, 'broker', 'company-name');
  return {
    id: resource.id,
    name: stringAttr(resource.attributes, 'company-name').trim(),
    broker_id: broker.id,
    broker_name: broker.name,
    is_active: boolAttr(resource.attributes, 'is-active')
  };
}

export function buildCustomerDetails(resource: Resource, included: IncludedIndex): CustomerDetails {
  const attrs = resource.attributes;
  const developer = resolveRelated(resource, included, 'developer', 'name');
  return {
    ...buildCustomerRow(resource, included),
    phone_number: stringAttr(attrs, 'phone-number'),
    company_address: stringAttr(attrs, 'company-address'),
    company_url: stringAttr(attrs, 'company-url'),
    notes: stringAttr(attrs, 'notes'),
    credit_limit: numberAttrAsString(attrs, 'credit-limit'),
    credit_type: stringAttr(attrs, 'credit-type'),
    default_payment_terms: numberAttrAsString(attrs, 'default-payment-terms'),
    is_trucking_company: boolAttr(attrs, 'is-trucking-company'),
    requires_union_drivers: boolAttr(attrs, 'requires-union-drivers'),
    developer_id: developer.id,
    developer_name: developer.name
  };
}

function flag(name: string, description: string): AttributeFlag {
  return { flag: name, description: `${description} (true/false)`, kind: 'boolean' };
}

const CUSTOMER_ATTRIBUTES: readonly AttributeFlag[] = [
  { flag: 'name', description: 'Company name', attribute: 'company-name' },
  { flag: 'phone-number', description: 'Phone number' },
  { flag: 'fax-number', description: 'Fax number' },
  { flag: 'company-address', description: 'Company address' },
  { flag: 'bill-to-address', description: 'Bill-to address' },
  { flag: 'company-url', description: 'Company website URL' },
  { flag: 'notes', description: 'Notes' },
  flag('requires-union-drivers', 'Requires union drivers'),
  flag('is-trucking-company', 'Is trucking company'),
  { flag: 'default-payment-terms', description: 'Default payment terms', kind: 'integer' },
  flag('generate-daily-invoice', 'Generate daily invoice'),
  { flag: 'credit-limit', description: 'Credit limit', kind: 'number' },
  { flag: 'credit-type', description: 'Credit type' },
  flag('is-active', 'Active status'),
  flag('is-controlled-by-broker', 'Controlled by broker'),
  flag('is-developer', 'Is developer'),
  flag('favorite', 'Favorite'),
  flag('requires-job-production-plans', 'Requires job production plans'),
  { flag: 'default-time-card-approval-process', description: 'Default time card approval process' }
];

const CUSTOMER_RELATIONSHIPS: readonly RelationshipFlag[] = [
  { flag: 'developer', description: 'Developer ID', type: 'developers' },
  { flag: 'default-operations-contact', description: 'Default operations contact user ID', type: 'users' },
  { flag: 'default-financial-contact', description: 'Default financial contact user ID', type: 'users' },
  { flag: 'default-dispatch-contact', description: 'Default dispatch contact user ID', type: 'users' }
];

export const customers = defineResource<CustomerRow, CustomerDetails>({
  name: 'customers',
  type: 'customers',
  singular: 'customer',
  category: 'organizations',
  description: 'Customer organizations',

  list: {
    include: ['broker'],
    fields: { customers: ['company-name', 'is-active', 'broker'], brokers: ['company-name'] },
    filters: [
      { flag: 'name', description: 'Filter by company name (partial match)', filter: 'q' },
      { flag: 'broker', description: 'Filter by broker ID (comma-separated for multiple)', kind: 'list' },
      booleanFilter('is-active', 'Filter by active status'),
      booleanFilter('is-developer', 'Filter by developer status'),
      booleanFilter('is-trucking-company', 'Filter by trucking company status')
    ],
    buildRow: buildCustomerRow,
    columns: [
      { header: 'ID', value: row => row.id },
      { header: 'NAME', value: row => row.name, maxWidth: 40 },
      { header: 'BROKER', value: row => firstNonEmpty(row.broker_name, row.broker_id), maxWidth: 30 },
      { header: 'ACTIVE', value: row => formatBool(row.is_active) }
    ]
  },

  show: {
    include: ['broker', 'developer'],
    fields: { brokers: ['company-name'], developers: ['name'] },
    buildDetails: buildCustomerDetails,
    layout: {
      fields: [
        { label: 'ID', value: d => d.id, always: true },
        { label: 'Name', value: d => d.name },
        { label: 'Active', value: d => formatBool(d.is_active) },
        { label: 'Phone', value: d => d.phone_number },
        { label: 'Address', value: d => d.company_address },
        { label: 'Website', value: d => d.company_url },
        { label: 'Notes', value: d => d.notes },
        { label: 'Credit Limit', value: d => d.credit_limit },
        { label: 'Credit Type', value: d => d.credit_type },
        { label: 'Default Payment Terms', value: d => d.default_payment_terms },
        { label: 'Trucking Company', value: d => formatBool(d.is_trucking_company) },
        { label: 'Requires Union Drivers', value: d => formatBool(d.requires_union_drivers) }
      ],
      sections: [
        {
          title: 'Relationships',
          fields: [
            { label: 'Broker', value: d => formatRelated(d.broker_name, d.broker_id) },
            { label: 'Developer', value: d => formatRelated(d.developer_name, d.developer_id) }
          ]
        }
      ]
    }
  },

  create: {
    attributes: CUSTOMER_ATTRIBUTES.map(spec => (spec.flag === 'name' ? { ...spec, required: true } : spec)),
    relationships: [{ flag: 'broker', description: 'Broker ID', type: 'brokers', required: true }, ...CUSTOMER_RELATIONSHIPS]
  },

  update: {
    attributes: CUSTOMER_ATTRIBUTES,
    relationships: CUSTOMER_RELATIONSHIPS
  },

  label: d => d.name,
  writeOutput: 'summary'
});
