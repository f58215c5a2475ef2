export * from './annuity'
export * from './bankAccount'
export * from './benefits'
export * from './donation'
export * from './donorAdvisedFund'
export * from './family'
export * from './housing'
export * from './hsa'
export * from './insurance'
export * from './investments'
export * from './ira'
export * from './job'
export * from './job401k'
export * from './lifeEvents'
export * from './lifeInsurance'
export * from './loans'
export * from './person'
