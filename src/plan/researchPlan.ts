import { ArchiveDescriptor } from "../config";

export interface PlannedArchive {
  name: string;
  location?: string;
  collections: string[];
  contact?: string;
  requestProcedure?: string;
  accessRequirement: string;
}

export interface ResearchPlan {
  primaryArchives: PlannedArchive[];
  searchStrategy: string[];
  searchTerms: string[];
  ocrProcess: string[];
}

type ArchiveNotes = Omit<PlannedArchive, "name">;

const KNOWN_ARCHIVES = new Map<string, ArchiveNotes>([
  [
    "Churchill Archives Centre",
    {
      location: "Churchill College, Cambridge, UK",
      collections: ["CHAR (Chartwell Papers)", "CHUR (Churchill Papers)"],
      contact: "archives@chu.cam.ac.uk",
      requestProcedure: "Email with specific reference numbers and research purpose",
      accessRequirement: "Reader's ticket or Churchill Archive subscription; API access requires registration",
    },
  ],
  [
    "Library and Archives Canada",
    {
      location: "Ottawa, Canada",
      collections: ["Military Personnel Records", "Canadian Expeditionary Force"],
      accessRequirement: "Institutional access or a formal access request for restricted material",
    },
  ],
  [
    "University of Toronto Archives",
    {
      location: "Toronto, Canada",
      collections: ["Gooderham Family fonds", "Fairfax family papers"],
      contact: "utarms@utoronto.ca",
      accessRequirement: "Research appointment and request approval",
    },
  ],
]);

const SEARCH_STRATEGY = [
  "Query the Churchill Archives catalogue for correspondence from Fairfax, Oct-Dec 1946",
  "Request specific CHAR files containing personal correspondence from this period",
  "Search Canadian archives for Fairfax's personal papers or letter copies",
  "Contact Fairfax/Gooderham family descendants for private collections",
  "Search newspaper archives for any mention of communication between the two",
];

const SEARCH_TERMS = [
  "Fairfax, Bryan Charles",
  "Colonel Fairfax",
  "Fairfax + Churchill + 1946",
  "Canadian Battalion + Churchill + correspondence",
  "Gooderham + Churchill",
];

const OCR_PROCESS = [
  "Download document images from archive APIs",
  "Process images with OCR to extract text",
  "Analyze text for relevance to Fairfax-Churchill correspondence",
  "Extract letter components (date, salutation, body, signature)",
  "Validate letter content against historical context",
];

const LIKELY_TOPICS = [
  "Reflections on Churchill's 'Iron Curtain' speech (March 1946)",
  "Comments on Churchill's opposition leadership in Parliament",
  "Shared memories from military service",
  "Discussion of post-war international relations",
  "Possible mention of Churchill's upcoming history of WWII",
  "News of Toronto social and political circles",
  "Personal reflections on Fairfax's military career and Churchill's leadership",
];

function planArchive(archive: ArchiveDescriptor): PlannedArchive {
  const notes = KNOWN_ARCHIVES.get(archive.name);
  if (!notes) {
    return {
      name: archive.name,
      collections: [...archive.collections],
      accessRequirement: "Unknown; contact the archive before requesting material",
    };
  }
  return { name: archive.name, ...notes, collections: [...notes.collections] };
}

export function generateResearchPlan(archives: readonly ArchiveDescriptor[]): ResearchPlan {
  return {
    primaryArchives: archives.map(planArchive),
    searchStrategy: [...SEARCH_STRATEGY],
    searchTerms: [...SEARCH_TERMS],
    ocrProcess: [...OCR_PROCESS],
  };
}

export function likelyLetterTopics(): string[] {
  return [...LIKELY_TOPICS];
}
