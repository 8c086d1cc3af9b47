import type { McfTemplate } from '@pgx-graph/shared'

export const GENE_TEMPLATE: McfTemplate = {
  text: `Node: dcid:{dcid}
typeOf: dcs:Gene
name: "{name}"
geneSymbol: "{symbol}"
pharmGKBID: "{pharm_id}"
ncbiGeneID: {ncbi_ids}
hgncID: {hgnc_ids}
ensemblID: {ensembl_ids}
alternativeGeneSymbol: {alt_symbols}`,
  required: ['dcid'],
}

export const DRUG_TEMPLATE: McfTemplate = {
  text: `Node: dcid:{dcid}
typeOf: {type}
name: "{dc_name}"
commonName: "{name}"
tradeName: {trade_names}
smilesRepresentation: "{smiles}"
inChI: "{inchi}"
inChIKey: "{inchi_key}"
pharmGKBID: "{pharm_id}"
rxNormID: {rx_ids}
atcCode: {atc_ids}
pubChemCompoundID: {pubchem_compound_ids}`,
  required: ['dcid', 'type'],
}

export const RELATION_TEMPLATE: McfTemplate = {
  text: `Node: dcid:{dcid}
typeOf: dcs:ChemicalCompoundGeneAssociation
name: "{name}"
geneID: dcid:{gene_dcid}
compoundID: dcid:{drug_dcid}
pubMedID: {pubmed_ids}
isPharmacokineticRelationship: {pk_bool}
isPharmacodynamicRelationship: {pd_bool}
relationshipAssociationType: {assoc_enums}
relationshipEvidenceType: {evid_enums}`,
  required: ['dcid', 'gene_dcid', 'drug_dcid'],
}

// relationships.tsv "Association" column
export const ASSOCIATION_ENUMS: Readonly<Record<string, string>> = {
  associated: 'RelationshipAssociationTypeAssociated',
  'not associated': 'RelationshipAssociationTypeNotAssociated',
  ambiguous: 'RelationshipAssociationTypeAmbiguous',
}

// relationships.tsv "Evidence" column
export const EVIDENCE_ENUMS: Readonly<Record<string, string>> = {
  AutomatedAnnotation: 'RelationshipEvidenceTypeAutomatedAnnotation',
  ClinicalAnnotation: 'RelationshipEvidenceTypeClinicalAnnotation',
  DataAnnotation: 'RelationshipEvidenceTypeDataAnnotation',
  GuidelineAnnotation: 'RelationshipEvidenceTypeGuidelineAnnotation',
  LabelAnnotation: 'RelationshipEvidenceTypeLabelAnnotation',
  Literature: 'RelationshipEvidenceTypeLiterature',
  MultilinkAnnotation: 'RelationshipEvidenceTypeMultilinkAnnotation',
  Pathway: 'RelationshipEvidenceTypePathway',
  VariantAnnotation: 'RelationshipEvidenceTypeVariantAnnotation',
  VipGene: 'RelationshipEvidenceTypeVipGene',
}

// genes.tsv "Cross-references" source name -> MCF property
export const GENE_XREF_PROPS: Readonly<Record<string, string>> = {
  'ALFRED': 'alfredID',
  'Comparative Toxicogenomics Database': 'ctdID',
  'Ensembl': 'ensemblID',
  'GenAtlas': 'genAtlasID',
  'GeneCard': 'geneCardID',
  'HGNC': 'hgncID',
  'HumanCyc Gene': 'humanCycGeneID',
  'ModBase': 'modBaseID',
  'MutDB': 'mutDBID',
  'NCBI Gene': 'ncbiGeneID',
  'OMIM': 'omimID',
  'RefSeq DNA': 'refSeqDNAID',
  'RefSeq Protein': 'refSeqProteinID',
  'RefSeq RNA': 'refSeqRNAID',
  'UCSC Genome Browser': 'ucscGenomeBrowserID',
  'UniProtKB': 'uniProtID',
}

// drugs.tsv / chemicals.tsv "Cross-references" source name -> MCF property
export const DRUG_XREF_PROPS: Readonly<Record<string, string>> = {
  'BindingDB': 'bindingDBID',
  'ChEBI': 'chebiID',
  'ChemSpider': 'chemSpiderID',
  'ClinicalTrials.gov': 'clinicalTrialsGovID',
  'Drugs Product Database (DPD)': 'drugProductDatabaseID',
  'DrugBank': 'drugBankID',
  'FDA Drug Label at DailyMed': 'dailyMedID',
  'HET': 'hetID',
  'HMDB': 'hmdbID',
  'IUPHAR Ligand': 'iupharLigandID',
  'KEGG Compound': 'keggCompoundID',
  'KEGG Drug': 'keggDrugID',
  'National Drug Code Directory': 'ndcID',
  'PDB': 'pdbID',
  'PubChem Compound': 'pubChemCompoundID',
  'PubChem Substance': 'pubChemSubstanceID',
  'Therapeutic Targets Database': 'ttdID',
  'URL': 'url',
  'Web Resource': 'webResource',
  'Wikipedia': 'wikipediaID',
}

export const DRUG_SUBTYPES: readonly string[] = ['Drug', 'Drug Class', 'Prodrug']

export const GENOME_BUILDS = ['hg19', 'hg38'] as const

export const DCID_PREFIX = 'bio/'
export const RELATION_PREFIX = 'CGA_'
